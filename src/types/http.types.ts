/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  auth?: DigestCredentials;
}

/**
 * Credentials answered to an HTTP digest challenge
 */
export interface DigestCredentials {
  username: string;
  password: string;
}

/**
 * Parsed WWW-Authenticate: Digest challenge
 */
export interface DigestChallenge {
  realm: string;
  nonce: string;
  qop?: string;
  opaque?: string;
  algorithm?: string;
}
