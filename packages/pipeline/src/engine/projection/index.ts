export { CoordinateTransformer, lonLatToRaw, rawToPlanar } from './coordinate-transformer.js';
export { NetworkLocationCache, parseNetworkLocation, readNetworkLocation } from './network-location.js';
export { lonLatToUtm, parseUtmProjection, centralMeridian } from './utm.js';
export type { UtmZone } from './utm.js';
export type { NetworkLocation, NetworkBoundary, PlanarPoint } from './types.js';
