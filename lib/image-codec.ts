/**
 * Image file decoding/encoding
 * Keeps sharp out of the converter core, which only sees RGBA ImageData
 */

import sharp from 'sharp';
import { ImageData, RGBA_CHANNELS } from './image-data';
import { OutputFormat } from './cubemap-types';

export const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
  webp: 'webp',
};

/**
 * Decode an image file (buffer or path) into 8-bit RGBA pixels
 */
export async function decodeImage(input: Buffer | string): Promise<ImageData> {
  const { data, info } = await sharp(input)
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return new ImageData(info.width, info.height, new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
}

/**
 * Encode RGBA pixels into an image file buffer
 */
export async function encodeImage(image: ImageData, format: OutputFormat, quality: number = 95): Promise<Buffer> {
  const pipeline = sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
    raw: {
      width: image.width,
      height: image.height,
      channels: RGBA_CHANNELS
    }
  });

  switch (format) {
    case 'jpeg':
      return pipeline
        .jpeg({ quality, chromaSubsampling: '4:4:4' })
        .toBuffer();
    case 'webp':
      return pipeline
        .webp({ quality })
        .toBuffer();
    case 'png':
      return pipeline
        .png()
        .toBuffer();
  }
}
