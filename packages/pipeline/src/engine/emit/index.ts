export * from './artifact-paths.js';
export * from './additional-file.js';
export * from './vtype-file.js';
export * from './traffic-sim-config.js';
export * from './service-file.js';
export * from './seeds.js';
export * from './network-sim-config.js';
