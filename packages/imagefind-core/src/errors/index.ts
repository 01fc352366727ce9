export * from './base.error';
export * from './validation.error';
export * from './configuration.error';
export * from './collaborator.error';
export * from './image-decode.error';
export * from './payload.error';
