export * from './logger';
export * from './event-bus';
export * from './storage';
export * from './documents';
export * from './access';
export * from './advisor';
