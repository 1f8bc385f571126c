export { createReplaceRoutes, createLegacyUploadRoutes } from './ReplaceRoutes.js';
export { createSystemRoutes } from './system.js';
export type { HealthProbe } from './system.js';
