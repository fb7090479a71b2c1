// Barrel export for models

export * from './types.js';
export * from './artifact.js';
export * from './rfc.js';
export * from './adr.js';
export * from './work-item.js';
export * from './diagnostic.js';
export * from './project-index.js';
export * from './reference.js';
