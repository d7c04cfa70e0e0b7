export * from './advisor';
