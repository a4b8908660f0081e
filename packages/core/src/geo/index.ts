export { EARTH_RADIUS_KM, haversineKm, nearestStation } from './geo-resolver';
export type { Coordinates, StationRecord } from './geo-resolver';
