/**
 * Cube Map Generation
 * Turns a panorama file into six encoded cube face images
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CubeFace, CUBE_FACES, Interpolation, OutputFormat } from './cubemap-types';
import { renderCubeMap, getFaceSize } from './cubemap-converter';
import { parseCubeFace } from './cubemap-orientation';
import { decodeImage, encodeImage, FILE_EXTENSIONS } from './image-codec';

export interface GenerateCubeMapOptions {
  faces?: readonly (CubeFace | string)[];
  /** Radians */
  rotation?: number;
  interpolation?: Interpolation | string;
  maxWidth?: number;
  format?: OutputFormat;
  quality?: number;
}

/**
 * Encoded faces together with the format they were encoded in
 */
export interface EncodedCubeMap {
  format: OutputFormat;
  faces: Map<CubeFace, Buffer>;
}

/**
 * Convert equirectangular panorama to cube map faces
 */
export async function generateCubeMapFromPanorama(
  panorama: Buffer | string,
  options: GenerateCubeMapOptions = {}
): Promise<EncodedCubeMap> {
  const {
    rotation = 0,
    interpolation = 'linear',
    maxWidth,
    format = 'png',
    quality = 95
  } = options;
  const faces = (options.faces ?? CUBE_FACES).map(parseCubeFace);

  const readData = await decodeImage(panorama);
  const { width, height } = readData;

  if (Math.abs(width / height - 2) > 0.1) {
    console.warn(`Panorama is ${width}x${height}, not 2:1 - cube faces will be distorted`);
  }

  const faceSize = getFaceSize(width, maxWidth);
  console.log(`Converting ${width}x${height} equirectangular panorama to ${faceSize}x${faceSize} cube faces (${interpolation})`);

  const rendered = renderCubeMap(readData, { faces, rotation, interpolation, maxWidth });

  const encoded = await Promise.all(
    [...rendered].map(async ([face, writeData]) => {
      const buffer = await encodeImage(writeData, format, quality);
      console.log(`Generated cube face: ${face} (${buffer.length} bytes)`);
      return [face, buffer] as const;
    })
  );

  return { format, faces: new Map(encoded) };
}

/**
 * Write faces as <face>.<ext> into outputDir, returning the written paths
 */
export async function writeCubeMapFaces(
  { format, faces }: EncodedCubeMap,
  outputDir: string
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const written: string[] = [];
  for (const [face, buffer] of faces) {
    const filePath = path.join(outputDir, `${face}.${FILE_EXTENSIONS[format]}`);
    await writeFile(filePath, buffer);
    written.push(filePath);
  }

  console.log(`Wrote ${written.length} cube faces to ${outputDir}`);
  return written;
}
