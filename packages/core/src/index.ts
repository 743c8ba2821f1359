export * from './types';
export * from './errors';
export * from './prompts';
export * from './dialects';
export * from './schema';
export * from './schemas';
export * from './trace';
export * from './logger';
