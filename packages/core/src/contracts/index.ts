export * from './graph';
export * from './routing';
export * from './hooks';
