import type { VehicleClass } from '../../types/index.js';

/** Passenger traffic */
export const PASSENGER_CLASS: VehicleClass = Object.freeze({ id: 'miv', vehicleTypeCode: 5, departLane: 'best' });

/** Heavy traffic; trucks depart on the rightmost lane */
export const HEAVY_CLASS: VehicleClass = Object.freeze({ id: 'sv', vehicleTypeCode: 9, departLane: 'first' });

/** Processing order */
export const VEHICLE_CLASSES: readonly VehicleClass[] = Object.freeze([PASSENGER_CLASS, HEAVY_CLASS]);
