export * from './congestion-levels.js';
export * from './segments.js';
export * from './vehicle-classes.js';
export * from './demand-matrix.js';
export * from './demand-generator.js';
