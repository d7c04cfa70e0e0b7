export * from './json';
export * from './state';
export * from './checkpoint';
export * from './trace';
export * from './breakpoint';
