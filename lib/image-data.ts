import { InvalidDimensionsError } from './errors';

export const RGBA_CHANNELS = 4;

/**
 * RGBA pixel store, 8 bits per channel, row-major with a stride of width * 4
 */
export class ImageData {
  readonly width: number;
  readonly height: number;
  readonly channels = RGBA_CHANNELS;
  readonly data: Uint8Array;

  constructor(width: number, height: number, data?: Uint8Array) {
    assertDimensions(width, height);

    const expectedLength = width * height * RGBA_CHANNELS;
    if (data && data.length !== expectedLength) {
      throw new InvalidDimensionsError(
        width,
        height,
        `pixel store holds ${data.length} bytes, expected ${expectedLength}`
      );
    }

    this.width = width;
    this.height = height;
    this.data = data ?? new Uint8Array(expectedLength);
  }

  /**
   * Byte offset of pixel (x, y); callers clamp x and y beforehand
   */
  indexOf(x: number, y: number): number {
    return RGBA_CHANNELS * (y * this.width + x);
  }
}

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new InvalidDimensionsError(width, height, 'width and height must be integers');
  }
  if (width <= 0 || height <= 0) {
    throw new InvalidDimensionsError(width, height, 'width and height must be positive');
  }
}

/**
 * Re-checks an image that may have been built outside this module
 * (e.g. a structurally typed object or a mutated store)
 */
export function assertImageData(image: ImageData): void {
  assertDimensions(image.width, image.height);
  const expectedLength = image.width * image.height * RGBA_CHANNELS;
  if (image.data.length !== expectedLength) {
    throw new InvalidDimensionsError(
      image.width,
      image.height,
      `pixel store holds ${image.data.length} bytes, expected ${expectedLength}`
    );
  }
}
