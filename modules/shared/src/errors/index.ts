/**
 * Account Service - Error Constants Module
 *
 * @module errors
 */

export {
    AuthErrors,
    GeneralErrors,
} from './error-codes';

export type {
    AuthErrorCode,
    GeneralErrorCode,
    ServiceErrorCode,
} from './error-codes';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorMessages } from './error-messages';

export { ConfigurationError, isConfigurationError } from './configuration-error';
