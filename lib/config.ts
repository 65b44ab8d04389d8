import { z } from 'zod';
import { INTERPOLATIONS, Interpolation, OutputFormat } from './cubemap-types';
import { InvalidOptionsError } from './errors';

export interface ConverterConfig {
  /** Names outside INTERPOLATIONS are kept and sample as nearest */
  interpolation: Interpolation | string;
  maxWidth?: number;
  rotationDegrees: number;
  format: OutputFormat;
  quality: number;
}

export const converterConfigSchema = z.object({
  interpolation: z.string().min(1).default('linear'),
  maxWidth: z.coerce.number().int().positive().optional(),
  rotationDegrees: z.coerce.number().finite().default(0),
  format: z.string().default('png').pipe(z.enum(['png', 'jpeg', 'webp'])),
  quality: z.coerce.number().int().min(1).max(100).default(95),
});

export type ConverterConfigInput = {
  [K in keyof ConverterConfig]?: string | number;
};

/**
 * Validate raw option values (strings from env or argv, or numbers) into a ConverterConfig
 */
export function parseConverterConfig(input: ConverterConfigInput): ConverterConfig {
  const result = converterConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new InvalidOptionsError(`Invalid converter options - ${details}`);
  }

  if (!INTERPOLATIONS.some((known) => known === result.data.interpolation)) {
    console.warn(`Unknown interpolation "${result.data.interpolation}", using nearest neighbour`);
  }

  return result.data;
}

/**
 * Raw CUBEMAP_* values, empty strings treated as unset
 */
export function readConverterEnv(env: NodeJS.ProcessEnv = process.env): ConverterConfigInput {
  return {
    interpolation: env.CUBEMAP_INTERPOLATION || undefined,
    maxWidth: env.CUBEMAP_MAX_WIDTH || undefined,
    rotationDegrees: env.CUBEMAP_ROTATION_DEGREES || undefined,
    format: env.CUBEMAP_OUTPUT_FORMAT || undefined,
    quality: env.CUBEMAP_JPEG_QUALITY || undefined,
  };
}

/**
 * Read converter defaults from the environment
 */
export function loadConverterConfig(env: NodeJS.ProcessEnv = process.env): ConverterConfig {
  return parseConverterConfig(readConverterEnv(env));
}

export function degreesToRadians(degrees: number): number {
  return degrees * Math.PI / 180;
}
