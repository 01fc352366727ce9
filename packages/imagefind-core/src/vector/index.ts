export * from './vector-reducer';
