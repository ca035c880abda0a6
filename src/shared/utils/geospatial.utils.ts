/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * Pure functions, no I/O. Used for the flight (great-circle) estimate.
 *
 * =============================================================================
 */

/**
 * Earth's mean radius
 */
export const EARTH_RADIUS = {
  KM: 6371,
};

export interface LatLng {
  lat: number;
  lng: number;
}

/**
 * Calculate distance between two GPS coordinates using Haversine formula
 *
 * @param lat1 Origin latitude
 * @param lng1 Origin longitude
 * @param lat2 Destination latitude
 * @param lng2 Destination longitude
 * @returns Distance in kilometers
 */
export function haversineDistanceKm(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  // Clamp guards against a > 1 from floating point on antipodal points
  const c = 2 * Math.atan2(Math.sqrt(Math.min(1, a)), Math.sqrt(Math.max(0, 1 - a)));

  return EARTH_RADIUS.KM * c;
}

/**
 * Great-circle distance between two points, in kilometers
 */
export function greatCircleDistanceKm(from: LatLng, to: LatLng): number {
  return haversineDistanceKm(from.lat, from.lng, to.lat, to.lng);
}

/**
 * Latitude in [-90, 90], longitude in [-180, 180]
 */
export function isValidCoordinate(point: LatLng): boolean {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lng) &&
    point.lat >= -90 &&
    point.lat <= 90 &&
    point.lng >= -180 &&
    point.lng <= 180
  );
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Round to a fixed number of decimals (2 by default, matching the sheet output)
 */
export function roundTo(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
