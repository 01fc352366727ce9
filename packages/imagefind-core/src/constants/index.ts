export * from './limits';
export * from './formats';
