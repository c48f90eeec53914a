/** Bounding box in projected network coordinates */
export interface NetworkBoundary {
  readonly xMin: number;
  readonly yMin: number;
  readonly xMax: number;
  readonly yMax: number;
}

/** The `<location>` element of a SUMO network */
export interface NetworkLocation {
  /** `netOffset`: shift applied by netconvert to the projected coordinates */
  readonly offset: { readonly x: number; readonly y: number };
  /** `convBoundary` */
  readonly boundary: NetworkBoundary;
  /** proj string, or `!` when the network is not geo-referenced */
  readonly projParameter: string;
}

/** Planar position in the network simulator (y axis pointing down) */
export interface PlanarPoint {
  readonly x: number;
  readonly y: number;
}
