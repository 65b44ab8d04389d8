/**
 * Cube Map Types
 * Shared by the converter core, the codec layer and the command line
 */

/**
 * Cube map face identifiers following standard naming convention
 */
export enum CubeFace {
  POSITIVE_Z = 'pz', // Front
  NEGATIVE_Z = 'nz', // Back
  POSITIVE_X = 'px', // Right
  NEGATIVE_X = 'nx', // Left
  POSITIVE_Y = 'py', // Top
  NEGATIVE_Y = 'ny', // Bottom
}

export const CUBE_FACES: readonly CubeFace[] = [
  CubeFace.POSITIVE_Z,
  CubeFace.NEGATIVE_Z,
  CubeFace.POSITIVE_X,
  CubeFace.NEGATIVE_X,
  CubeFace.POSITIVE_Y,
  CubeFace.NEGATIVE_Y,
];

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/**
 * 'cubic' and 'lanczos' are reserved names; they sample like 'nearest'
 */
export type Interpolation = 'nearest' | 'linear' | 'cubic' | 'lanczos';

export const INTERPOLATIONS: readonly Interpolation[] = ['nearest', 'linear', 'cubic', 'lanczos'];

export type OutputFormat = 'png' | 'jpeg' | 'webp';

export interface RenderFaceOptions {
  face: CubeFace | string;
  /** Horizontal rotation in radians, any real value */
  rotation: number;
  interpolation: Interpolation | string;
  /** Upper bound for the face side; unbounded when omitted */
  maxWidth?: number;
}

export interface RenderCubeMapOptions extends Omit<RenderFaceOptions, 'face'> {
  faces?: readonly (CubeFace | string)[];
}
