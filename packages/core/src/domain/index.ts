export * from './enums';
export * from './content';
export * from './decision';
export * from './workflow';
