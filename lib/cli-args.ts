import { parseArgs } from 'node:util';
import { ConverterConfig, ConverterConfigInput, parseConverterConfig, readConverterEnv } from './config';
import { CubeFace } from './cubemap-types';
import { parseCubeFace } from './cubemap-orientation';
import { InvalidOptionsError } from './errors';

export const USAGE = `Usage: convert-panorama <input> [outputDir] [options]

Options:
  --face <name>            Face to render (pz, nz, px, nx, py, ny); repeatable, default all six
  --interpolation <name>   linear or nearest (default: linear)
  --rotation <degrees>     Horizontal rotation of the cube (default: 0)
  --max-width <px>         Upper bound for the face size (default: panorama width / 4)
  --format <fmt>           png, jpeg or webp (default: png)
  --quality <1-100>        JPEG/WebP quality (default: 95)
  -h, --help               Show this message`;

export interface ConvertCommand {
  input: string;
  outputDir: string;
  faces?: CubeFace[];
  config: ConverterConfig;
  help: boolean;
}

/**
 * Parse command line arguments; flags win over CUBEMAP_* environment variables
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ConvertCommand {
  const { values, positionals } = readArgs(argv);

  if (values.help) {
    return { input: '', outputDir: '', config: parseConverterConfig({}), help: true };
  }

  const [input, outputDir = '.', ...rest] = positionals;
  if (!input) {
    throw new InvalidOptionsError('Missing input panorama path');
  }
  if (rest.length > 0) {
    throw new InvalidOptionsError(`Unexpected arguments: ${rest.join(' ')}`);
  }

  // Merged before validation; a flag replaces a bad variable
  const fromEnv = readConverterEnv(env);
  const merged: ConverterConfigInput = {
    interpolation: values.interpolation ?? fromEnv.interpolation,
    maxWidth: values['max-width'] ?? fromEnv.maxWidth,
    rotationDegrees: values.rotation ?? fromEnv.rotationDegrees,
    format: values.format ?? fromEnv.format,
    quality: values.quality ?? fromEnv.quality,
  };

  return {
    input,
    outputDir,
    faces: values.face?.map(parseCubeFace),
    config: parseConverterConfig(merged),
    help: false,
  };
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        face: { type: 'string', multiple: true },
        interpolation: { type: 'string' },
        rotation: { type: 'string' },
        'max-width': { type: 'string' },
        format: { type: 'string' },
        quality: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    // parseArgs rejects unknown flags and missing flag values
    throw new InvalidOptionsError(error instanceof Error ? error.message : String(error));
  }
}
