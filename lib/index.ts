export * from './cubemap-types';
export * from './errors';
export * from './image-data';
export * from './cubemap-orientation';
export * from './spherical-projection';
export * from './pixel-sampler';
export * from './cubemap-converter';
export * from './config';
export * from './image-codec';
export * from './cubemap-generator';
export * from './cli-args';
