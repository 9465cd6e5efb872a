/**
 * Account Service - Validation Module
 *
 * @module validation
 */

export {
    isValidEmail,
    MAX_EMAIL_LENGTH,
} from './email';

export {
    isValidRedirectUri,
    normalizeRedirectUri,
} from './redirect-uri';
