export * from './schema/tables.js';
export * from './schema/dto.js';
export * from './schema/registry.js';
export * from './domain/enums.js';
export * from './domain/packaging.js';
export * from './domain/breakpoints.js';
// keep exports sorted manually
