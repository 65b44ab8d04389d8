import { ImageData } from './image-data';
import { Interpolation } from './cubemap-types';

const COLOR_CHANNELS = 3;

/**
 * Writes the RGB channels of the pixel at byte offset `to` in `write`,
 * sampled from `read` at continuous coordinates (xFrom, yFrom)
 */
export type CopyPixel = (read: ImageData, write: ImageData, xFrom: number, yFrom: number, to: number) => void;

export function clamp(x: number, min: number, max: number): number {
  return Math.min(max, Math.max(x, min));
}

export function copyPixelNearest(read: ImageData, write: ImageData, xFrom: number, yFrom: number, to: number): void {
  const nearest = read.indexOf(
    clamp(Math.round(xFrom), 0, read.width - 1),
    clamp(Math.round(yFrom), 0, read.height - 1)
  );

  for (let channel = 0; channel < COLOR_CHANNELS; channel++) {
    write.data[to + channel] = read.data[nearest + channel];
  }
}

/**
 * Bilinear blend of the four surrounding pixels. Coordinates are clamped before the
 * weights are taken, so at the borders the blend collapses onto a single row/column.
 * Results are rounded up, not to nearest.
 */
export function copyPixelBilinear(read: ImageData, write: ImageData, xFrom: number, yFrom: number, to: number): void {
  const xl = clamp(Math.floor(xFrom), 0, read.width - 1);
  const xr = clamp(Math.ceil(xFrom), 0, read.width - 1);
  const xf = xFrom - xl;

  const yl = clamp(Math.floor(yFrom), 0, read.height - 1);
  const yr = clamp(Math.ceil(yFrom), 0, read.height - 1);
  const yf = yFrom - yl;

  const p00 = read.indexOf(xl, yl);
  const p10 = read.indexOf(xr, yl);
  const p01 = read.indexOf(xl, yr);
  const p11 = read.indexOf(xr, yr);

  for (let channel = 0; channel < COLOR_CHANNELS; channel++) {
    const p0 = read.data[p00 + channel] * (1 - xf) + read.data[p10 + channel] * xf;
    const p1 = read.data[p01 + channel] * (1 - xf) + read.data[p11 + channel] * xf;
    // Uint8Array wraps on overflow, so keep float error above 255 from turning into 0
    write.data[to + channel] = clamp(Math.ceil(p0 * (1 - yf) + p1 * yf), 0, 255);
  }
}

/**
 * Pick the sampler for an interpolation name.
 * Only 'linear' is implemented beyond nearest; 'cubic', 'lanczos' and unknown names
 * deliberately fall back to nearest neighbour.
 */
export function getCopyPixel(interpolation: Interpolation | string): CopyPixel {
  switch (interpolation) {
    case 'linear': return copyPixelBilinear;
    case 'cubic':
    case 'lanczos':
    case 'nearest':
    default: return copyPixelNearest;
  }
}
