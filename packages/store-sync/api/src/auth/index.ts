export { registerAuthMiddleware, keysMatch } from './middleware.js';
export type { AuthPluginOptions } from './middleware.js';
