import { CubeFace, CUBE_FACES, Vector3 } from './cubemap-types';
import { InvalidFaceIdentifierError } from './errors';

export function isCubeFace(value: string): value is CubeFace {
  return CUBE_FACES.some((face) => face === value);
}

/**
 * Resolve an untrusted face name, throwing on anything outside the six faces
 */
export function parseCubeFace(name: string): CubeFace {
  if (!isCubeFace(name)) {
    throw new InvalidFaceIdentifierError(name);
  }
  return name;
}

/**
 * Get 3D point on a cube face
 * The cube is centered at the origin with a side length of 2, so x and y are in range -1 to 1
 */
export function getCubeVector(face: CubeFace, x: number, y: number): Vector3 {
  switch (face) {
    case CubeFace.POSITIVE_Z: return { x: -1, y: -x, z: -y };
    case CubeFace.NEGATIVE_Z: return { x: 1, y: x, z: -y };
    case CubeFace.POSITIVE_X: return { x, y: -1, z: -y };
    case CubeFace.NEGATIVE_X: return { x: -x, y: 1, z: -y };
    case CubeFace.POSITIVE_Y: return { x: -y, y: -x, z: 1 };
    case CubeFace.NEGATIVE_Y: return { x: y, y: -x, z: -1 };
    default: {
      // Reached only when a caller bypasses the type system
      const unknown: never = face;
      throw new InvalidFaceIdentifierError(String(unknown));
    }
  }
}
