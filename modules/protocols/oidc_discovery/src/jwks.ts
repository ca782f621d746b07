/**
 * AuthGate - JWKS Endpoint - Lambda Handler
 *
 * Implements GET /.well-known/jwks.json returning the JSON Web Key Set
 * clients use to verify access and ID tokens.
 *
 * Features:
 *   - Public key comes from the configured signer (KMS or a local key)
 *   - In-memory caching to minimize KMS API calls
 *   - Cache-Control headers for client-side caching
 *
 * Key Rotation:
 *   A single key is served. Clients select it by the `kid` in the JWT
 *   header, which is the configured KEY_ID.
 *
 * @module oidc_discovery/jwks
 * @see RFC 7517 - JSON Web Key (JWK)
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    cacheableJson,
    createLogger,
    describeError,
    getMethod,
    lazyHandler,
    methodNotAllowed,
    serverError,
    toRsaJwk,
} from '@authgate/shared';
import type { Clock, HttpResponse, JWKS, JwtSigner, LambdaHandler } from '@authgate/shared';

/** Seconds a built key set is reused, and clients may cache it */
const CACHE_TTL_SECONDS = 3600;

export interface JwksDeps {
    readonly signer: JwtSigner;
    readonly clock: Clock;
}

interface CacheEntry {
    jwks: JWKS;
    expiresAt: number;
}

export function createJwksHandler(deps: JwksDeps): LambdaHandler {
    let cache: CacheEntry | null = null;

    async function loadJwks(): Promise<JWKS> {
        const now = deps.clock();
        if (cache && now < cache.expiresAt) {
            return cache.jwks;
        }
        const jwks: JWKS = { keys: [toRsaJwk(await deps.signer.getPublicKey(), deps.signer.keyId)] };
        cache = { jwks, expiresAt: now + CACHE_TTL_SECONDS };
        return jwks;
    }

    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);

        if (getMethod(event) !== 'GET') {
            return methodNotAllowed('GET');
        }

        try {
            const jwks = await loadJwks();
            logger.info('Returning JWKS', { kid: deps.signer.keyId });
            return cacheableJson(jwks, CACHE_TTL_SECONDS);
        } catch (err) {
            logger.error('JWKS endpoint error', { error: describeError(err) });
            return serverError('Failed to retrieve signing keys');
        }
    };
}

export const jwksHandler = lazyHandler((runtime) => createJwksHandler({
    signer: runtime.signer,
    clock: runtime.clock,
}));
