/**
 * Account Service - Google Sign-In
 *
 * GET /auth/google/login     → redirect to Google
 * GET /auth/google/callback  → redeem the code, issue a session
 *
 * @module auth_google
 */

export { createAuthorizeHandler, handler as authorizeHandler } from './authorize-handler';
export { createCallbackHandler, deadlineSignal, handler as callbackHandler } from './callback-handler';
