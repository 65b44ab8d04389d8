import path from 'node:path';
import {
  degreesToRadians,
  generateCubeMapFromPanorama,
  parseCliArgs,
  USAGE,
  writeCubeMapFaces
} from '@/lib';

void main().catch((error: unknown) => {
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exitCode = 1;
});

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.help) {
    console.log(USAGE);
    return;
  }

  const { config } = command;
  const inputPath = path.resolve(command.input);
  const outputDir = path.resolve(command.outputDir);

  console.log(`\n=== Cube Map Generation [${new Date().toISOString()}] ===`);
  console.log(`Input: ${inputPath}`);

  const cubeMap = await generateCubeMapFromPanorama(inputPath, {
    faces: command.faces,
    rotation: degreesToRadians(config.rotationDegrees),
    interpolation: config.interpolation,
    maxWidth: config.maxWidth,
    format: config.format,
    quality: config.quality,
  });

  const written = await writeCubeMapFaces(cubeMap, outputDir);
  written.forEach((filePath) => console.log(`  ${filePath}`));
}
