export * from './errors';
export * from './config';
export * from './logger';
export * from './descriptor/types';
export * from './response/types';
export * from './response/payload';
export * from './response/operation';
export * from './response/envelope';
export * from './response/result';
export * from './response/wire';
export * from './response/service';
