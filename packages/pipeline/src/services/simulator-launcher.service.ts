import { basename } from 'node:path';
import type { Logger } from '../lib/logger.js';
import type { LaunchMode } from '../types/index.js';
import type { ArtifactPathSet } from '../engine/emit/artifact-paths.js';
import type { ExitStatus, ExternalTool } from './external-tool.service.js';

export interface SimulatorTools {
  trafficSimulator: ExternalTool;
  networkSimulator: ExternalTool;
}

/**
 * Start the prepared scenario. `traffic` runs the traffic simulator on its
 * own; `network` runs the coupled simulation, which launches the traffic
 * simulator itself through TraCI.
 */
export async function launchSimulator(
  mode: LaunchMode,
  paths: Pick<ArtifactPathSet, 'sumoConfigFile' | 'networkConfigFile' | 'simulationRoot'>,
  tools: SimulatorTools,
  logger: Logger
): Promise<ExitStatus | null> {
  switch (mode) {
    case 'none':
      logger.debug('Simulator launch skipped');
      return null;
    case 'traffic':
      return tools.trafficSimulator.run(['-c', paths.sumoConfigFile, '-X', 'never']);
    case 'network':
      return tools.networkSimulator.run(['-u', 'Cmdenv', '-f', basename(paths.networkConfigFile)], {
        cwd: paths.simulationRoot,
      });
  }
}
