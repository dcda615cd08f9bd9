export * from './retry-policy';
export * from './error-classifier';
