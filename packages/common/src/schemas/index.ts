export { resolverSettingsSchema } from './config.js';
export type { ResolverSettings } from './config.js';
