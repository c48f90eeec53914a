export { RouteStageOrchestrator, od2tripsArgs, duarouterArgs } from './route-stage.js';
export type { RouteTools, ClassDemand } from './route-stage.js';
