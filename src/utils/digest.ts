import { createHash, randomBytes } from 'crypto';
import type { DigestChallenge, DigestCredentials } from '../types/http.types';

/**
 * Generate an MD5 hash of the input string
 * @param input - The string to hash
 * @returns The hexadecimal hash string
 */
export function md5(input: string): string {
  return createHash('md5').update(input).digest('hex');
}

/**
 * Parse a `WWW-Authenticate` header into a digest challenge.
 * Returns undefined for non-digest schemes or when realm/nonce are missing.
 */
export function parseDigestChallenge(header: string | undefined): DigestChallenge | undefined {
  if (!header || !/^digest\s/i.test(header)) {
    return undefined;
  }

  const params: Record<string, string> = {};
  const paramRegex = /(\w+)=(?:"([^"]*)"|([^\s,]+))/g;
  let match: RegExpExecArray | null;

  while ((match = paramRegex.exec(header.substring(7))) !== null) {
    params[match[1].toLowerCase()] = match[2] ?? match[3];
  }

  if (!params.realm || !params.nonce) {
    return undefined;
  }

  // Servers may offer "auth,auth-int"; only auth is supported
  const qop = params.qop
    ?.split(',')
    .map((q) => q.trim())
    .find((q) => q === 'auth');

  return {
    realm: params.realm,
    nonce: params.nonce,
    qop,
    opaque: params.opaque,
    algorithm: params.algorithm,
  };
}

export interface DigestRequest {
  method: string;
  uri: string;
  nc?: number;
  cnonce?: string;
}

/**
 * Build the `Authorization` header value answering a digest challenge (RFC 2617, MD5)
 */
export function buildDigestAuthorization(
  credentials: DigestCredentials,
  challenge: DigestChallenge,
  request: DigestRequest
): string {
  const ha1 = md5(`${credentials.username}:${challenge.realm}:${credentials.password}`);
  const ha2 = md5(`${request.method.toUpperCase()}:${request.uri}`);

  const parts = [
    `username="${credentials.username}"`,
    `realm="${challenge.realm}"`,
    `nonce="${challenge.nonce}"`,
    `uri="${request.uri}"`,
  ];

  if (challenge.qop) {
    const nc = (request.nc ?? 1).toString(16).padStart(8, '0');
    const cnonce = request.cnonce ?? randomBytes(8).toString('hex');
    const response = md5(`${ha1}:${challenge.nonce}:${nc}:${cnonce}:${challenge.qop}:${ha2}`);
    parts.push(`qop=${challenge.qop}`, `nc=${nc}`, `cnonce="${cnonce}"`, `response="${response}"`);
  } else {
    parts.push(`response="${md5(`${ha1}:${challenge.nonce}:${ha2}`)}"`);
  }

  if (challenge.opaque) {
    parts.push(`opaque="${challenge.opaque}"`);
  }
  if (challenge.algorithm) {
    parts.push(`algorithm=${challenge.algorithm}`);
  }

  return `Digest ${parts.join(', ')}`;
}
