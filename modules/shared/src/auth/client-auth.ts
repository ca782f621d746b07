/**
 * AuthGate - Client Authentication
 *
 * Credentials arrive by HTTP Basic (client_secret_basic) or in the request
 * body (client_secret_post). Public clients identify themselves by
 * client_id alone.
 *
 * Stored secrets are SHA-256 hashes and are compared in constant time.
 * Every failure maps to the same `invalid_client` response so callers
 * cannot tell an unknown client from a wrong secret.
 *
 * @module shared/auth/client-auth
 * @see RFC 6749 Section 2.3.1 - Client Password
 * @see RFC 7617 - The 'Basic' HTTP Authentication Scheme
 */

import type { OAuthClient } from '../../../shared_types/client';
import { constantTimeEqual, hashToken } from '../crypto';
import { fail, ok } from '../errors';
import type { Result } from '../errors';
import type { ClientRegistry } from '../storage/client-registry';

// =============================================================================
// Types
// =============================================================================

export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

export interface ClientCredentials {
    clientId?: string;
    clientSecret?: string;
    method: ClientAuthMethod;
}

export type ClientAuthFailure = 'unknown_client' | 'disabled_client' | 'missing_secret' | 'invalid_secret';

export interface AuthenticatedClient {
    client: OAuthClient;
    method: ClientAuthMethod;
}

// =============================================================================
// Credential Extraction
// =============================================================================

/**
 * Read client credentials from the Authorization header, falling back to
 * body parameters. A well-formed Basic header wins over the body.
 */
export function extractClientCredentials(
    params: URLSearchParams,
    authHeader?: string
): ClientCredentials {
    if (authHeader?.startsWith('Basic ')) {
        const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf8');
        // The secret may contain a colon; the id may not
        const colonIndex = decoded.indexOf(':');
        if (colonIndex > 0) {
            try {
                const clientId = decodeURIComponent(decoded.substring(0, colonIndex));
                const clientSecret = decodeURIComponent(decoded.substring(colonIndex + 1));
                return {
                    clientId,
                    clientSecret: clientSecret || undefined,
                    method: 'client_secret_basic',
                };
            } catch (err) {
                if (!(err instanceof URIError)) {
                    throw err;
                }
                // Malformed percent-encoding: treat as if no header was sent
            }
        }
    }

    const clientSecret = params.get('client_secret') || undefined;
    return {
        clientId: params.get('client_id') || undefined,
        clientSecret,
        method: clientSecret ? 'client_secret_post' : 'none',
    };
}

// =============================================================================
// Secret Verification
// =============================================================================

export function verifyClientSecret(secret: string, storedHash: string): boolean {
    return constantTimeEqual(hashToken(secret), storedHash);
}

// =============================================================================
// Client Authentication
// =============================================================================

/**
 * Resolve the client named by `credentials` and check its secret.
 * Confidential clients must present their secret; a public client's
 * secret, if sent, is ignored.
 */
export async function authenticateClient(
    registry: ClientRegistry,
    clientId: string,
    credentials: ClientCredentials
): Promise<Result<AuthenticatedClient, ClientAuthFailure>> {
    const client = await registry.findClient(clientId);
    if (!client) {
        return fail<ClientAuthFailure>('unknown_client');
    }
    if (!client.enabled) {
        return fail<ClientAuthFailure>('disabled_client');
    }

    if (!client.confidential) {
        return ok<AuthenticatedClient>({ client, method: 'none' });
    }

    if (!credentials.clientSecret) {
        return fail<ClientAuthFailure>('missing_secret');
    }
    if (!client.secretHash || !verifyClientSecret(credentials.clientSecret, client.secretHash)) {
        return fail<ClientAuthFailure>('invalid_secret');
    }

    return ok({ client, method: credentials.method });
}
