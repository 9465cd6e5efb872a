/**
 * Account Service - Userinfo
 *
 * GET /auth/me → claims of the presented session token
 *
 * @module userinfo
 */

export { createMeHandler, handler } from './me-handler';
