export * from './reducer';
export * from './fake';
