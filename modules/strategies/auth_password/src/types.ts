/**
 * Account Service - Password Login Types
 */

/** Body of POST /auth/login */
export interface LoginRequest {
    email: string;
    password: string;
}

export type LoginRequestValidation =
    | { valid: true; request: LoginRequest }
    | { valid: false; error: string };
