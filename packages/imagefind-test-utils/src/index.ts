export * from './fakes/fake-embedding-service';
export * from './fakes/in-memory-blob-store';
export * from './fakes/in-memory-vector-index';
export * from './factories/image.factory';
export * from './helpers/fs.helper';
