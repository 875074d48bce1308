// Authorization facade exports

export { AuthorizationService, createAuthorizationService } from './service.js';
export type { AuthorizationServiceOptions } from './service.js';
