export * from './journal';
export * from './workflow-instances';
export * from './assignments';
export * from './side-effects';
export * from './audit';
export * from './content-items';
export * from './submission';
