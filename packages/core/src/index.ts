export const VERSION = '0.1.0';

export * from './domain';
export * from './errors';
export * from './lifecycle';
export * from './config';
export * from './decision';
export * from './policy';
export * from './persistence';
export * from './collaborators';
export { z } from 'zod';
