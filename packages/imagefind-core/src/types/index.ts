export * from './collaborator.types';
export * from './pipeline.types';
