// Export all services

export * from './id-generator.js';
export * from './config/config-service.js';
export * from './storage/atomic-write.js';
export * from './storage/file-store.js';
export * from './validation/validator.js';
export * from './lifecycle/state-machine.js';
export * from './lifecycle/lifecycle-service.js';
export * from './reference/mention-matcher.js';
export * from './reference/reference-index.js';
export * from './reference/reference-service.js';
export * from './reference/source-scanner.js';
export * from './rfc/rfc-service.js';
export * from './adr/adr-service.js';
export * from './work/work-service.js';
export * from './edit/edit-service.js';
export * from './query/query-service.js';
export * from './render/renderer.js';
export * from './render/changelog.js';
export * from './governance/governance-service.js';
