export * from './hash.utils';
export * from './keys.utils';
export * from './discovery.utils';
export * from './concurrency.utils';
export * from './cli.utils';
