import { join } from 'node:path';
import type { Logger } from '../../lib/logger.js';
import type { DemandMatrixArtifact, ScenarioSpec, VehicleClass } from '../../types/index.js';
import { emitDemandMatrix } from './demand-matrix.js';
import { generateSegments } from './segments.js';

export interface DemandGeneratorPaths {
  /** Folder of the traffic profile holding `odm_<class>.csv` */
  trafficDir: string;
  /** Scenario route folder receiving the `.od` files */
  routesDir: string;
}

export function demandSourceFile(trafficDir: string, vehicleClass: VehicleClass): string {
  return join(trafficDir, `odm_${vehicleClass.id}.csv`);
}

export function demandMatrixFileName(scenarioId: string, vehicleClass: VehicleClass, index: number, code: string): string {
  return `${scenarioId}_odm_${vehicleClass.id}_${index}_qsv_${code}.od`;
}

export class DemandGenerator {
  constructor(
    private readonly spec: ScenarioSpec,
    private readonly paths: DemandGeneratorPaths,
    private readonly logger: Logger
  ) {}

  /**
   * Write one demand matrix per time segment for a vehicle class.
   * The whole sequence is validated before the first file is written.
   */
  async generateForClass(vehicleClass: VehicleClass): Promise<DemandMatrixArtifact[]> {
    const segments = generateSegments(this.spec);
    const source = demandSourceFile(this.paths.trafficDir, vehicleClass);

    const artifacts: DemandMatrixArtifact[] = [];
    for (const segment of segments) {
      const path = join(
        this.paths.routesDir,
        demandMatrixFileName(this.spec.id, vehicleClass, segment.index, segment.code)
      );
      artifacts.push(await emitDemandMatrix(source, segment, vehicleClass, path));
    }

    this.logger.debug({ vehicleClass: vehicleClass.id, matrices: artifacts.length }, 'Demand matrices written');
    return artifacts;
  }
}
