import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { generateCubeMapFromPanorama, writeCubeMapFaces } from './cubemap-generator';
import { renderCubeMap } from './cubemap-converter';
import { decodeImage } from './image-codec';
import { CubeFace } from './cubemap-types';
import { InvalidFaceIdentifierError, InvalidOptionsError } from './errors';

async function solidPanorama(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 40, g: 80, b: 120 } }
  })
    .png()
    .toBuffer();
}

/** Horizontal/vertical ramp so every face has distinct pixels */
async function rampPanorama(width: number, height: number): Promise<Buffer> {
  const pixels = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      pixels.set([x * 4, y * 8, 128], (y * width + x) * 3);
    }
  }
  return sharp(pixels, { raw: { width, height, channels: 3 } }).png().toBuffer();
}

describe('generateCubeMapFromPanorama', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('produces six encoded faces a quarter of the panorama wide', async () => {
    const { format, faces } = await generateCubeMapFromPanorama(await solidPanorama(64, 32), { interpolation: 'nearest' });

    expect(format).toBe('png');
    expect([...faces.keys()]).toEqual(['pz', 'nz', 'px', 'nx', 'py', 'ny']);
    for (const buffer of faces.values()) {
      const { data, info } = await sharp(buffer).raw().toBuffer({ resolveWithObject: true });
      expect([info.width, info.height, info.channels]).toEqual([16, 16, 4]);
      expect(Array.from(data.subarray(0, 4))).toEqual([40, 80, 120, 255]);
    }
  });

  it('encodes exactly the pixels renderCubeMap produces', async () => {
    const panorama = await rampPanorama(64, 32);
    const { faces } = await generateCubeMapFromPanorama(panorama, { faces: ['px', 'ny'], rotation: 0.5 });
    const expected = renderCubeMap(await decodeImage(panorama), {
      faces: ['px', 'ny'],
      rotation: 0.5,
      interpolation: 'linear'
    });

    for (const face of [CubeFace.POSITIVE_X, CubeFace.NEGATIVE_Y]) {
      const { data } = await sharp(faces.get(face)).raw().toBuffer({ resolveWithObject: true });
      expect(Array.from(data)).toEqual(Array.from(expected.get(face)?.data ?? []));
    }
  });

  it('renders only the requested faces at the requested size', async () => {
    const { format, faces } = await generateCubeMapFromPanorama(await solidPanorama(64, 32), {
      faces: ['py', 'ny'],
      maxWidth: 6,
      format: 'jpeg'
    });

    expect(format).toBe('jpeg');
    expect([...faces.keys()]).toEqual([CubeFace.POSITIVE_Y, CubeFace.NEGATIVE_Y]);
    const metadata = await sharp(faces.get(CubeFace.NEGATIVE_Y)).metadata();
    expect([metadata.format, metadata.width]).toEqual(['jpeg', 6]);
  });

  it('warns about panoramas that are not 2:1', async () => {
    await generateCubeMapFromPanorama(await solidPanorama(64, 64), { faces: ['pz'] });
    expect(console.warn).toHaveBeenCalledWith('Panorama is 64x64, not 2:1 - cube faces will be distorted');
  });

  it('rejects unknown faces', async () => {
    await expect(
      generateCubeMapFromPanorama(await solidPanorama(64, 32), { faces: ['pz', 'sideways'] })
    ).rejects.toThrow(InvalidFaceIdentifierError);
  });

  it('rejects a rotation that is not finite', async () => {
    await expect(
      generateCubeMapFromPanorama(await solidPanorama(64, 32), { rotation: Number.NaN })
    ).rejects.toThrow(InvalidOptionsError);
  });
});

describe('writeCubeMapFaces', () => {
  let outputDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    outputDir = await mkdtemp(path.join(tmpdir(), 'cubemap-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(outputDir, { recursive: true, force: true });
  });

  it('names files after the face and the format the faces carry', async () => {
    const faces = new Map([
      [CubeFace.POSITIVE_X, Buffer.from('a')],
      [CubeFace.NEGATIVE_X, Buffer.from('b')],
    ]);
    const nested = path.join(outputDir, 'faces');

    const written = await writeCubeMapFaces({ format: 'jpeg', faces }, nested);

    expect(written).toEqual([path.join(nested, 'px.jpg'), path.join(nested, 'nx.jpg')]);
    expect((await readdir(nested)).sort()).toEqual(['nx.jpg', 'px.jpg']);
  });

  it('uses the extension of the format the generator encoded', async () => {
    const cubeMap = await generateCubeMapFromPanorama(await solidPanorama(64, 32), {
      faces: ['pz'],
      format: 'webp'
    });

    const written = await writeCubeMapFaces(cubeMap, outputDir);

    expect(written).toEqual([path.join(outputDir, 'pz.webp')]);
  });
});
