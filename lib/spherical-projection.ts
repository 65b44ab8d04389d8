import { Vector3 } from './cubemap-types';

const TWO_PI = 2.0 * Math.PI;

export interface SphericalCoordinates {
  /** Radians in [0, 2π) */
  longitude: number;
  /** Radians in [0, π], 0 at +Z */
  latitude: number;
}

export interface SourceCoordinates {
  x: number;
  y: number;
}

/**
 * Floating-point modulo that never returns a negative value
 */
export function mod(x: number, n: number): number {
  return ((x % n) + n) % n;
}

/**
 * Project a cube face point onto the unit sphere by converting cartesian to spherical coordinates
 */
export function projectToSphere(cube: Vector3, rotation: number): SphericalCoordinates {
  const radius = Math.sqrt(cube.x * cube.x + cube.y * cube.y + cube.z * cube.z);
  const longitude = mod(Math.atan2(cube.y, cube.x) + rotation, TWO_PI);
  const latitude = Math.acos(cube.z / radius);

  return { longitude, latitude };
}

/**
 * Convert spherical coordinates to continuous equirectangular pixel coordinates
 * The half pixel offset puts integer coordinates on pixel centers
 */
export function sphereToSource(
  coords: SphericalCoordinates,
  sourceWidth: number,
  sourceHeight: number
): SourceCoordinates {
  return {
    x: sourceWidth * coords.longitude / TWO_PI - 0.5,
    y: sourceHeight * coords.latitude / Math.PI - 0.5,
  };
}
