export {
  createAuthServer,
  startHTTPServer,
  REFRESH_COOKIE_NAME,
  REFRESH_COOKIE_PATH,
} from './server.js';
export type { AuthServerOptions } from './server.js';
export {
  requireAccessToken,
  extractBearerToken,
  getAuthenticatedAccountId,
  AUTH_REALM,
} from './middleware.js';
export type { AccessTokenAuthenticator } from './middleware.js';
export { CredentialsBodySchema, ActivationBodySchema, parseBody } from './request-schemas.js';
