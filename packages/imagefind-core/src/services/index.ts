export * from './image-preprocessor';
export * from './inference-client';
export * from './supabase-blob-store';
export * from './qdrant-vector-index';
export * from './collaborators';
