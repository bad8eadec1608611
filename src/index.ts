// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// Collaborators
export * from './store/index.js';
export * from './notify/index.js';

// HTTP boundary
export * from './http/index.js';

// Configuration exports
export * from './config/index.js';

// Process wiring
export { createApplication } from './application.js';
export type { Application, ApplicationOverrides } from './application.js';

// Utility exports
export * from './utils/errors.js';
