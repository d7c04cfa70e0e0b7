export * from './logger';
export * from './bus';
export * from './storage';
export * from './documents';
export * from './access';
export * from './openai';
