import type { InfrastructureNode, PlacedInfrastructureNode } from '../../types/index.js';
import type { NetworkLocation, PlanarPoint } from './types.js';
import { NetworkLocationCache } from './network-location.js';
import { lonLatToUtm, parseUtmProjection } from './utm.js';

/**
 * Project [lon, lat] to the raw projected coordinates of the network
 * (the traffic simulator's UTM coordinates before `netOffset`).
 */
export function lonLatToRaw(lon: number, lat: number, location: NetworkLocation): [number, number] {
  return lonLatToUtm(lon, lat, parseUtmProjection(location.projParameter));
}

/**
 * Convert raw projected coordinates to the network simulator's planar frame.
 *
 * The traffic simulator's y axis points up and its origin is the lower-left
 * corner of `convBoundary`; the network simulator's y axis points down from
 * the upper edge, hence the flip against `yMax`.
 */
export function rawToPlanar(xs: number, ys: number, location: NetworkLocation): PlanarPoint {
  const { boundary, offset } = location;
  return {
    x: xs - boundary.xMin + offset.x,
    y: -(ys - boundary.yMax + offset.y),
  };
}

export class CoordinateTransformer {
  constructor(private readonly locations: NetworkLocationCache = new NetworkLocationCache()) {}

  /**
   * Transform a geodetic coordinate into the network simulator's planar frame.
   * Throws ProjectionError when the network cannot be loaded or the point is
   * outside the projection's domain.
   */
  async toLocalPlanar(lon: number, lat: number, netFile: string): Promise<PlanarPoint> {
    const location = await this.locations.load(netFile);
    const [xs, ys] = lonLatToRaw(lon, lat, location);
    return rawToPlanar(xs, ys, location);
  }

  async placeNodes(nodes: readonly InfrastructureNode[], netFile: string): Promise<PlacedInfrastructureNode[]> {
    const placed: PlacedInfrastructureNode[] = [];
    for (const node of nodes) {
      const { x, y } = await this.toLocalPlanar(node.lon, node.lat, netFile);
      placed.push({ ...node, x, y });
    }
    return placed;
  }
}
