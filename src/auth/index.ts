/**
 * Authentication module exports
 */

export {
  AuthManager,
  ACCESS_TOKEN_ID_HEADER,
  ACCESS_TOKEN_SECRET_HEADER,
  CLIENT_ACCESS_KEY_HEADER,
  CLIENT_KEY_ID_HEADER,
  JWT_HEADER,
} from './auth-manager';
export { JWTManager } from './jwt-manager';
