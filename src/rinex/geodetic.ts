import type { GeodeticPosition, Vector3 } from './types.js';

// WGS-84 ellipsoid
const A = 6378137.0;
const F = 1 / 298.257223563;
const B = A * (1 - F);
const E1_SQ = 1 - (1 - F) * (1 - F);
const EP_SQ = (A * A - B * B) / (B * B);

function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * ECEF metres to WGS-84 latitude/longitude (degrees) and ellipsoidal height
 * (metres), Bowring's closed form. Returns null for the origin, which
 * receivers write when they have no position.
 */
export function ecefToGeodetic([x, y, z]: Vector3): GeodeticPosition | null {
  const p = Math.sqrt(x * x + y * y);
  if (p === 0 && z === 0) return null;

  const th = Math.atan2(A * z, B * p);
  const lon = Math.atan2(y, x);
  const lat = Math.atan2(
    z + EP_SQ * B * Math.pow(Math.sin(th), 3),
    p - E1_SQ * A * Math.pow(Math.cos(th), 3),
  );
  const n = A / Math.sqrt(1 - E1_SQ * Math.pow(Math.sin(lat), 2));
  // Near the poles p / cos(lat) loses precision; measure along the axis instead.
  const height = Math.abs(Math.cos(lat)) > 1e-10
    ? p / Math.cos(lat) - n
    : Math.abs(z) - B;

  return { latitude: toDegrees(lat), longitude: toDegrees(lon), height };
}
