export * from './workflow-config';
