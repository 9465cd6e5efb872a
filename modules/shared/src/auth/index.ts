/**
 * Account Service - Authentication Module
 *
 * @module auth
 */

export { authenticateBearer, extractBearerToken } from './bearer';

export type { BearerAuthResult, BearerRejection } from './bearer';
