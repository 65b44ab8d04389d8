/**
 * Cube Map Errors
 * Every failure raised by the converter derives from CubemapError
 */

export type CubemapErrorCode =
  | 'INVALID_FACE_IDENTIFIER'
  | 'INVALID_DIMENSIONS'
  | 'INVALID_OPTIONS';

export class CubemapError extends Error {
  readonly code: CubemapErrorCode;

  constructor(code: CubemapErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidFaceIdentifierError extends CubemapError {
  readonly face: string;

  constructor(face: string) {
    super('INVALID_FACE_IDENTIFIER', `Unknown cube face: "${face}". Expected one of pz, nz, px, nx, py, ny`);
    this.face = face;
  }
}

export class InvalidDimensionsError extends CubemapError {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number, reason: string) {
    super('INVALID_DIMENSIONS', `Invalid image dimensions ${width}x${height}: ${reason}`);
    this.width = width;
    this.height = height;
  }
}

export class InvalidOptionsError extends CubemapError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message);
  }
}
