/**
 * AuthGate - Token Service
 *
 * Authorization code exchange. Steps run in this order, each one final on
 * failure:
 *
 *   1. grant_type is authorization_code
 *   2. Redeem the code (atomic; a miss is invalid_grant)
 *   3. Code was issued to this client and redirect_uri
 *   4. Authenticate the client, then check PKCE
 *   5. Mint tokens
 *
 * The code is redeemed before the client is authenticated, so a code
 * presented with a bad secret is burned. Expired, reused and unknown codes
 * give the same error.
 *
 * @module oauth2_token/service
 * @see RFC 6749 Section 4.1.3 - Access Token Request
 * @see RFC 7636 Section 4.6 - Server Verifies code_verifier
 */

import {
    ErrorMessages,
    GrantTypes,
    OAuthErrors,
    TokenTypes,
    authenticateClient,
    fail,
    ok,
    parseScopes,
    validateVerifierShape,
    verifyChallenge,
} from '@authgate/shared';
import type {
    AuditLogger,
    AuthorizationCodeStore,
    ClientRegistry,
    Clock,
    OAuthError,
    Result,
} from '@authgate/shared';
import type { AuthorizationCode } from '../../../shared_types/token';
import { mintTokens } from './tokens';
import type { TokenRequest, TokenResponseBody, TokenSettings } from './types';

export class TokenService {
    constructor(
        private readonly clients: ClientRegistry,
        private readonly codes: AuthorizationCodeStore,
        private readonly clock: Clock,
        private readonly settings: TokenSettings
    ) {}

    async exchange(request: TokenRequest, audit: AuditLogger): Promise<Result<TokenResponseBody, OAuthError>> {
        const clientId = request.credentials.clientId;

        // ---------------------------------------------------------------------
        // Step 1: grant type, then required parameters
        // ---------------------------------------------------------------------
        if (!request.grantType) {
            return fail(OAuthErrors.invalidRequest(ErrorMessages.MISSING_GRANT_TYPE));
        }
        if (request.grantType !== GrantTypes.AUTHORIZATION_CODE) {
            return this.reject(audit, OAuthErrors.unsupportedGrantType(ErrorMessages.UNSUPPORTED_GRANT_TYPE), clientId);
        }
        if (!request.code) {
            return fail(OAuthErrors.invalidRequest(ErrorMessages.MISSING_CODE));
        }
        if (!clientId) {
            return fail(OAuthErrors.invalidRequest(ErrorMessages.MISSING_CLIENT_ID));
        }
        if (!request.redirectUri) {
            return fail(OAuthErrors.invalidRequest(ErrorMessages.MISSING_REDIRECT_URI));
        }

        // ---------------------------------------------------------------------
        // Step 2: redeem
        // ---------------------------------------------------------------------
        const now = this.clock();
        const code = await this.codes.redeem(request.code, now);
        if (!code) {
            return this.reject(audit, OAuthErrors.invalidGrant(ErrorMessages.INVALID_CODE), clientId);
        }

        // ---------------------------------------------------------------------
        // Step 3: binding
        // ---------------------------------------------------------------------
        if (code.clientId !== clientId) {
            return this.reject(audit, OAuthErrors.invalidGrant(ErrorMessages.CLIENT_MISMATCH), clientId);
        }
        if (code.redirectUri !== request.redirectUri) {
            return this.reject(audit, OAuthErrors.invalidGrant(ErrorMessages.REDIRECT_URI_CHANGED), clientId);
        }

        // ---------------------------------------------------------------------
        // Step 4: client authentication and PKCE
        // ---------------------------------------------------------------------
        const authenticated = await authenticateClient(this.clients, clientId, request.credentials);
        if (!authenticated.ok) {
            audit.clientAuthFailed({ clientId, reason: authenticated.error });
            return fail(OAuthErrors.invalidClient(ErrorMessages.CLIENT_AUTH_FAILED));
        }
        const { client, method } = authenticated.value;
        audit.clientAuthenticated({ clientId, method });

        if (!client.allowedGrantTypes.includes(GrantTypes.AUTHORIZATION_CODE)) {
            return this.reject(audit, OAuthErrors.unauthorizedClient(ErrorMessages.GRANT_NOT_ALLOWED), clientId);
        }

        const pkce = this.checkPkce(code, request.codeVerifier, audit);
        if (!pkce.ok) {
            return pkce;
        }

        // ---------------------------------------------------------------------
        // Step 5: mint
        // ---------------------------------------------------------------------
        const tokens = await mintTokens(this.settings, code, client, now);
        const actor = { type: 'USER', sub: code.userId, username: code.username } as const;

        audit.authCodeExchanged(actor, { clientId, grantType: GrantTypes.AUTHORIZATION_CODE });
        audit.tokenIssued(actor, {
            clientId,
            scopes: parseScopes(code.scope),
            expiresAt: now + tokens.accessTokenExpiresIn,
            idToken: tokens.idToken !== undefined,
        });

        return ok<TokenResponseBody>({
            access_token: tokens.accessToken,
            token_type: TokenTypes.BEARER,
            expires_in: tokens.accessTokenExpiresIn,
            refresh_token: tokens.refreshToken,
            scope: code.scope,
            ...(tokens.idToken !== undefined && { id_token: tokens.idToken }),
        });
    }

    /**
     * Codes issued without a challenge skip PKCE. Failures are audited as
     * PKCE_FAILED rather than as a generic grant failure.
     */
    private checkPkce(
        code: AuthorizationCode,
        verifier: string | undefined,
        audit: AuditLogger
    ): Result<void, OAuthError> {
        if (code.codeChallenge === undefined) {
            return ok(undefined);
        }
        const method = code.codeChallengeMethod ?? 'plain';

        if (!verifier) {
            audit.pkceFailed({ clientId: code.clientId, userId: code.userId, method, reason: 'missing_verifier' });
            return fail(OAuthErrors.invalidGrant(ErrorMessages.MISSING_CODE_VERIFIER));
        }
        if (!validateVerifierShape(verifier).ok) {
            audit.pkceFailed({ clientId: code.clientId, userId: code.userId, method, reason: 'malformed_verifier' });
            return fail(OAuthErrors.invalidGrant(ErrorMessages.PKCE_VERIFICATION_FAILED));
        }
        if (!verifyChallenge(verifier, code.codeChallenge, method)) {
            audit.pkceFailed({ clientId: code.clientId, userId: code.userId, method, reason: 'challenge_mismatch' });
            return fail(OAuthErrors.invalidGrant(ErrorMessages.PKCE_VERIFICATION_FAILED));
        }
        return ok(undefined);
    }

    private reject(
        audit: AuditLogger,
        error: OAuthError,
        clientId: string | undefined
    ): Result<TokenResponseBody, OAuthError> {
        audit.tokenGrantFailed({ clientId, error: error.code, reason: error.description });
        return fail(error);
    }
}
