/**
 * Shared entities, contracts, ports and configuration of the workflow engine.
 */
export * from './lifecycle';
export * from './entities';
export * from './contracts';
export * from './ports';
export * from './config';
export * from './errors';
