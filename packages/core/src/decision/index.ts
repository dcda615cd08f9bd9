export * from './decision-engine';
