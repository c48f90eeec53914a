// Scenario
export interface ScenarioSpec {
  readonly id: string;
  /** Net file name under `sumo/net/`. */
  readonly network: string;
  /** Traffic profile folder under `sumo/traffic/`. */
  readonly trafficProfile: string;
  /** Add the scripted rolling-obstruction vehicle. */
  readonly obstruction: boolean;
  readonly durationSeconds: number;
  /** Single-character congestion-level codes, one per time segment. */
  readonly congestionSequence: readonly string[];
  /** V2X equipment (penetration) rate, 0–1. */
  readonly v2xRate: number;
  /** Driver reaction time / desired headway `tau` in seconds. */
  readonly reactionTime: number;
  readonly repeats: number;
  readonly useTrafficLights: boolean;
}

// Vehicle classes
export type DepartLanePolicy = 'first' | 'best';

export interface VehicleClass {
  readonly id: string;
  /** Vehicle type code written into the demand matrices. */
  readonly vehicleTypeCode: number;
  readonly departLane: DepartLanePolicy;
}

// Time segmentation
export interface TimeSegment {
  readonly index: number;
  readonly code: string;
  readonly factor: number;
  readonly startSeconds: number;
  readonly durationSeconds: number;
}

export interface TimeWindow {
  /** `HH.MM` */
  readonly from: string;
  /** `HH.MM` */
  readonly to: string;
}

export interface DemandMatrixArtifact {
  readonly path: string;
  readonly vehicleClass: string;
  readonly vehicleTypeCode: number;
  readonly segmentIndex: number;
  readonly code: string;
  readonly factor: number;
  readonly window: TimeWindow;
}

export interface DemandRow {
  readonly from: string;
  readonly to: string;
  readonly count: number;
}

// Routes
export interface RouteArtifact {
  readonly kind: 'trips' | 'obstruction';
  /** Vehicle class id, or `obstruction`. */
  readonly source: string;
  readonly path: string;
}

export type RouteArtifactSet = readonly RouteArtifact[];

// Infrastructure
export interface InfrastructureNode {
  readonly id: string;
  readonly lon: number;
  readonly lat: number;
}

export interface PlacedInfrastructureNode extends InfrastructureNode {
  readonly x: number;
  readonly y: number;
}

// Pipeline run
export type LaunchMode = 'none' | 'traffic' | 'network';

export interface PipelineOptions {
  launch: LaunchMode;
  keepScratch: boolean;
  strictVehicleTypes: boolean;
}

export interface ScenarioOutcome {
  scenarioId: string;
  ok: boolean;
  durationMs: number;
  /** Present when `ok` is false. */
  error?: {
    name: string;
    message: string;
  };
}
