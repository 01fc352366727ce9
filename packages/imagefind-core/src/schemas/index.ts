// Re-export all schemas and types
export * from './image-payload.schema';
export * from './search.schema';
export * from './collection.schema';
export * from './inference.schema';
export * from './config.schema';
export * from './pipeline.schema';
