export { GoogleOAuthClient, GOOGLE_SCOPES } from './google-client';

export type {
    AuthorizationRequest,
    FetchLike,
    OAuthFailure,
    OAuthFailureKind,
} from './types';
