// HTTP utilities
export { createHttpClient, formatHttpError } from './http';

// Digest authentication
export { md5, parseDigestChallenge, buildDigestAuthorization } from './digest';
export type { DigestRequest } from './digest';

// Re-export types
export type { HttpClientConfig, DigestCredentials, DigestChallenge } from '../types/http.types';
