export * from './states';
export * from './validator';
