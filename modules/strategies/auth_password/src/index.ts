/**
 * Account Service - Password Login Strategy
 *
 * Module exports for the password login handler.
 */

export type { LoginRequest, LoginRequestValidation } from './types';

export { validateLoginRequest, MAX_PASSWORD_LENGTH } from './validation';

export { createLoginHandler, handler as loginHandler } from './login-handler';
