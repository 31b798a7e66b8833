/**
 * Physical constants used across look-angle, great-circle and ETA
 * calculations.
 */

/** Mean Earth radius in metres, for great-circle distances. */
export const EARTH_RADIUS_M = 6_371_000;

/** Geostationary altitude above the equator in metres. */
export const GEO_ALTITUDE_M = 35_786_000;

/** Degrees → radians. */
export const DEG_TO_RAD = Math.PI / 180;

/** Radians → degrees. */
export const RAD_TO_DEG = 180 / Math.PI;

/** Metres per nautical mile. */
export const METERS_PER_NM = 1852;

/** Altitude assumed for route points that carry none (35,000 ft). */
export const DEFAULT_CRUISE_ALTITUDE_M = 10_668;
