/**
 * Equirectangular to Cube Map Converter
 * Renders cube faces from a 2:1 panoramic image held in memory
 */

import { CubeFace, CUBE_FACES, RenderCubeMapOptions, RenderFaceOptions } from './cubemap-types';
import { getCubeVector, parseCubeFace } from './cubemap-orientation';
import { projectToSphere, sphereToSource } from './spherical-projection';
import { getCopyPixel } from './pixel-sampler';
import { ImageData, assertImageData } from './image-data';
import { InvalidDimensionsError, InvalidOptionsError } from './errors';

/**
 * Side length of the faces rendered from a source of the given width.
 * A face spans a quarter of the horizontal sweep.
 */
export function getFaceSize(sourceWidth: number, maxWidth: number = Number.POSITIVE_INFINITY): number {
  if (maxWidth !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxWidth) || maxWidth <= 0)) {
    throw new InvalidDimensionsError(maxWidth, maxWidth, 'maxWidth must be a positive integer');
  }
  return Math.min(maxWidth, Math.floor(sourceWidth / 4));
}

/**
 * Renders a cube face from a 2:1 panoramic image.
 * The source is only read; the returned image is freshly allocated.
 */
export function renderFace(readData: ImageData, options: RenderFaceOptions): ImageData {
  assertImageData(readData);
  const face = parseCubeFace(options.face);
  if (!Number.isFinite(options.rotation)) {
    throw new InvalidOptionsError(`Rotation must be a finite number of radians, got ${options.rotation}`);
  }

  const faceWidth = getFaceSize(readData.width, options.maxWidth);
  if (faceWidth === 0) {
    throw new InvalidDimensionsError(readData.width, readData.height, 'source must be at least 4 pixels wide');
  }
  const faceHeight = faceWidth;

  const writeData = new ImageData(faceWidth, faceHeight);
  const copyPixel = getCopyPixel(options.interpolation);

  for (let y = 0; y < faceHeight; y++) {
    for (let x = 0; x < faceWidth; x++) {
      const to = writeData.indexOf(x, y);

      // fill alpha channel
      writeData.data[to + 3] = 255;

      const cube = getCubeVector(face, 2 * (x + 0.5) / faceWidth - 1, 2 * (y + 0.5) / faceHeight - 1);
      const source = sphereToSource(projectToSphere(cube, options.rotation), readData.width, readData.height);

      copyPixel(readData, writeData, source.x, source.y, to);
    }
  }

  return writeData;
}

/**
 * Render several faces (all six by default) with shared rotation, interpolation and size.
 * Every face name is checked before any rendering starts.
 */
export function renderCubeMap(readData: ImageData, options: RenderCubeMapOptions): Map<CubeFace, ImageData> {
  const faces = (options.faces ?? CUBE_FACES).map(parseCubeFace);
  const rendered = new Map<CubeFace, ImageData>();

  for (const face of faces) {
    rendered.set(face, renderFace(readData, { ...options, face }));
  }

  return rendered;
}
