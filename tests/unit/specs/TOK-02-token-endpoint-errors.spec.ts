/**
 * TOK-02: Token Endpoint Errors
 *
 * Validates the rejection paths at /oauth2/token: grant type, code binding,
 * single use, client authentication and PKCE. Also covers the request
 * framing (method, content type, duplicates) and CORS for browser clients.
 *
 * @see RFC 6749 Section 5.2 - Error Response
 * @see RFC 7636 Section 4.6 - Server Verifies code_verifier
 */

import { describe, it, expect } from 'vitest';
import { ErrorMessages } from '@authgate/shared';
import { createTokenHandler, getAllowedOrigin } from '@authgate/oauth2-token';
import type { CodeRequest } from '@authgate/shared';
import type { OAuthClient } from '../../../modules/shared_types/client';
import { apiEvent, basicAuth, formPost, header, jsonBody, jsonRequest } from '../support/http';
import { MemoryClientRegistry, MemoryCodeStore } from '../support/stores';
import {
  CLIENT_SECRET,
  ISSUER,
  auditCollector,
  confidentialClient,
  publicClient,
  signer,
  testClock,
} from '../support/fixtures';

const CALLBACK = 'https://app.example.test/callback';
const SPA_CALLBACK = 'https://spa.example.test/callback';
const VERIFIER = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
const CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

const legacyClient = confidentialClient({ clientId: 'legacy-app', allowedGrantTypes: ['refresh_token'] });

function setup(allowedOrigins: string[] = []) {
  const time = testClock();
  const audit = auditCollector();
  const codes = new MemoryCodeStore(time.clock);
  const handler = createTokenHandler({
    clients: new MemoryClientRegistry([confidentialClient(), publicClient(), legacyClient]),
    codes,
    clock: time.clock,
    issuer: ISSUER,
    signer,
    idTokenTtl: 3600,
    allowedOrigins,
    auditSink: audit.sink,
  });

  const issue = async (client: OAuthClient, request: CodeRequest) =>
    (await codes.create(client, request, 'user-1', 'alice')).code;

  return { handler, codes, audit, time, issue };
}

function webExchange(code: string, overrides: Record<string, string> = {}, secret = CLIENT_SECRET) {
  return formPost('/oauth2/token', {
    grant_type: 'authorization_code',
    code,
    redirect_uri: CALLBACK,
    ...overrides,
  }, basicAuth('web-app', secret));
}

function spaExchange(code: string, verifier?: string) {
  return formPost('/oauth2/token', {
    grant_type: 'authorization_code',
    code,
    redirect_uri: SPA_CALLBACK,
    client_id: 'spa-app',
    ...(verifier !== undefined && { code_verifier: verifier }),
  });
}

const PKCE_REQUEST: CodeRequest = {
  redirectUri: SPA_CALLBACK,
  scope: 'openid',
  codeChallenge: CHALLENGE,
  codeChallengeMethod: 'S256',
};

describe('TOK-02: Token Endpoint Errors', () => {
  describe('grant type and parameters', () => {
    it('should require grant_type', async () => {
      const { handler } = setup();

      const response = await handler(formPost('/oauth2/token', { code: 'abc' }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'invalid_request',
        error_description: ErrorMessages.MISSING_GRANT_TYPE,
      });
    });

    it.each(['refresh_token', 'client_credentials', 'password'])(
      'should answer %s with unsupported_grant_type',
      async (grantType) => {
        const { handler } = setup();

        const response = await handler(formPost('/oauth2/token', { grant_type: grantType }, basicAuth('web-app', CLIENT_SECRET)));

        expect(response.statusCode).toBe(400);
        expect(jsonBody(response)).toEqual({
          error: 'unsupported_grant_type',
          error_description: ErrorMessages.UNSUPPORTED_GRANT_TYPE,
        });
      }
    );

    it('should require code, client_id and redirect_uri', async () => {
      const { handler } = setup();

      const noCode = await handler(formPost('/oauth2/token', { grant_type: 'authorization_code' }));
      const noClient = await handler(formPost('/oauth2/token', { grant_type: 'authorization_code', code: 'abc' }));
      const noRedirect = await handler(formPost('/oauth2/token', {
        grant_type: 'authorization_code',
        code: 'abc',
        client_id: 'web-app',
      }));

      expect(jsonBody(noCode).error_description).toBe(ErrorMessages.MISSING_CODE);
      expect(jsonBody(noClient).error_description).toBe(ErrorMessages.MISSING_CLIENT_ID);
      expect(jsonBody(noRedirect).error_description).toBe(ErrorMessages.MISSING_REDIRECT_URI);
    });
  });

  describe('code redemption', () => {
    it('should reject an unknown code', async () => {
      const { handler, audit } = setup();

      const response = await handler(webExchange('no-such-code'));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({ error: 'invalid_grant', error_description: ErrorMessages.INVALID_CODE });
      expect(audit.find('TOKEN_GRANT_FAILED')?.details).toEqual({
        clientId: 'web-app',
        error: 'invalid_grant',
        reason: ErrorMessages.INVALID_CODE,
      });
    });

    it('should redeem a code only once', async () => {
      const { handler, issue } = setup();
      const code = await issue(confidentialClient(), { redirectUri: CALLBACK, scope: 'openid' });

      const first = await handler(webExchange(code));
      const replay = await handler(webExchange(code));

      expect(first.statusCode).toBe(200);
      expect(replay.statusCode).toBe(400);
      expect(jsonBody(replay).error).toBe('invalid_grant');
    });

    it('should reject a code at its expiry time', async () => {
      const { handler, issue, time } = setup();
      const code = await issue(confidentialClient(), { redirectUri: CALLBACK, scope: 'openid' });
      time.advance(600);

      const response = await handler(webExchange(code));

      expect(jsonBody(response)).toEqual({ error: 'invalid_grant', error_description: ErrorMessages.INVALID_CODE });
    });

    it('should accept a code one second before expiry', async () => {
      const { handler, issue, time } = setup();
      const code = await issue(confidentialClient(), { redirectUri: CALLBACK, scope: 'openid' });
      time.advance(599);

      const response = await handler(webExchange(code));

      expect(response.statusCode).toBe(200);
    });

    it('should reject a code issued to another client', async () => {
      const { handler, issue, codes } = setup();
      const code = await issue(publicClient(), { redirectUri: SPA_CALLBACK, scope: 'openid' });

      const response = await handler(webExchange(code, { redirect_uri: SPA_CALLBACK }));

      expect(jsonBody(response)).toEqual({ error: 'invalid_grant', error_description: ErrorMessages.CLIENT_MISMATCH });
      expect(codes.codes.get(code)?.used).toBe(true);
    });

    it('should reject a redirect_uri that differs from the authorization request', async () => {
      const { handler, issue } = setup();
      const code = await issue(confidentialClient(), { redirectUri: CALLBACK, scope: 'openid' });

      const response = await handler(webExchange(code, { redirect_uri: 'https://app.example.test/other' }));

      expect(jsonBody(response)).toEqual({
        error: 'invalid_grant',
        error_description: ErrorMessages.REDIRECT_URI_CHANGED,
      });
    });
  });

  describe('client authentication', () => {
    it('should answer a wrong secret with 401 and a Basic challenge, burning the code', async () => {
      const { handler, issue, codes, audit } = setup();
      const code = await issue(confidentialClient(), { redirectUri: CALLBACK, scope: 'openid' });

      const response = await handler(webExchange(code, {}, 'wrong-secret'));

      expect(response.statusCode).toBe(401);
      expect(header(response, 'WWW-Authenticate')).toBe('Basic realm="oauth"');
      expect(jsonBody(response)).toEqual({
        error: 'invalid_client',
        error_description: ErrorMessages.CLIENT_AUTH_FAILED,
      });
      expect(audit.find('CLIENT_AUTH_FAILED')?.details).toEqual({ clientId: 'web-app', reason: 'invalid_secret' });

      const retry = await handler(webExchange(code));
      expect(jsonBody(retry).error).toBe('invalid_grant');
      expect(codes.codes.get(code)?.used).toBe(true);
    });

    it('should require a secret from a confidential client', async () => {
      const { handler, issue, audit } = setup();
      const code = await issue(confidentialClient(), { redirectUri: CALLBACK, scope: 'openid' });

      const response = await handler(formPost('/oauth2/token', {
        grant_type: 'authorization_code',
        code,
        redirect_uri: CALLBACK,
        client_id: 'web-app',
      }));

      expect(response.statusCode).toBe(401);
      expect(audit.find('CLIENT_AUTH_FAILED')?.details).toEqual({ clientId: 'web-app', reason: 'missing_secret' });
    });

    it('should refuse a client without the authorization_code grant', async () => {
      const { handler, issue } = setup();
      const code = await issue(legacyClient, { redirectUri: CALLBACK, scope: 'openid' });

      const response = await handler(formPost('/oauth2/token', {
        grant_type: 'authorization_code',
        code,
        redirect_uri: CALLBACK,
      }, basicAuth('legacy-app', CLIENT_SECRET)));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'unauthorized_client',
        error_description: ErrorMessages.GRANT_NOT_ALLOWED,
      });
    });
  });

  describe('PKCE', () => {
    it('should require the verifier when the code carries a challenge', async () => {
      const { handler, issue, audit } = setup();
      const code = await issue(publicClient(), PKCE_REQUEST);

      const response = await handler(spaExchange(code));

      expect(jsonBody(response)).toEqual({
        error: 'invalid_grant',
        error_description: ErrorMessages.MISSING_CODE_VERIFIER,
      });
      const entry = audit.find('PKCE_FAILED');
      expect(entry?.outcome).toBe('FAILURE');
      expect(entry?.details).toEqual({
        clientId: 'spa-app',
        userId: 'user-1',
        method: 'S256',
        reason: 'missing_verifier',
      });
    });

    it('should reject a verifier that does not match the challenge', async () => {
      const { handler, issue, audit } = setup();
      const code = await issue(publicClient(), PKCE_REQUEST);

      const response = await handler(spaExchange(code, 'x'.repeat(43)));

      expect(jsonBody(response)).toEqual({
        error: 'invalid_grant',
        error_description: ErrorMessages.PKCE_VERIFICATION_FAILED,
      });
      expect(audit.find('PKCE_FAILED')?.details).toMatchObject({ reason: 'challenge_mismatch' });
    });

    it('should reject a malformed verifier', async () => {
      const { handler, issue, audit } = setup();
      const code = await issue(publicClient(), PKCE_REQUEST);

      const response = await handler(spaExchange(code, 'too-short'));

      expect(jsonBody(response).error_description).toBe(ErrorMessages.PKCE_VERIFICATION_FAILED);
      expect(audit.find('PKCE_FAILED')?.details).toMatchObject({ reason: 'malformed_verifier' });
    });

    it('should not accept the challenge itself as a plain verifier', async () => {
      const { handler, issue } = setup();
      const code = await issue(publicClient(), PKCE_REQUEST);

      const response = await handler(spaExchange(code, CHALLENGE));

      expect(jsonBody(response).error_description).toBe(ErrorMessages.PKCE_VERIFICATION_FAILED);
    });

    it('should burn the code on a failed verification', async () => {
      const { handler, issue } = setup();
      const code = await issue(publicClient(), PKCE_REQUEST);

      await handler(spaExchange(code));
      const retry = await handler(spaExchange(code, VERIFIER));

      expect(jsonBody(retry).error_description).toBe(ErrorMessages.INVALID_CODE);
    });
  });

  describe('request framing', () => {
    it('should only allow POST and OPTIONS', async () => {
      const { handler } = setup();

      const response = await handler(apiEvent({ method: 'GET', path: '/oauth2/token' }));

      expect(response.statusCode).toBe(405);
      expect(header(response, 'Allow')).toBe('POST, OPTIONS');
    });

    it('should reject other content types', async () => {
      const { handler } = setup();

      const response = await handler(apiEvent({
        method: 'POST',
        path: '/oauth2/token',
        headers: { 'content-type': 'text/plain' },
        body: 'grant_type=authorization_code',
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error_description).toBe(ErrorMessages.INVALID_CONTENT_TYPE);
    });

    it('should reject a JSON body with non-string values', async () => {
      const { handler } = setup();

      const response = await handler(jsonRequest('POST', '/oauth2/token', { grant_type: 'authorization_code', code: 42 }));

      expect(jsonBody(response).error_description).toBe(ErrorMessages.INVALID_BODY);
    });

    it('should reject duplicated parameters', async () => {
      const { handler } = setup();

      const response = await handler(apiEvent({
        method: 'POST',
        path: '/oauth2/token',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: 'grant_type=authorization_code&code=a&code=b&redirect_uri=x&redirect_uri=y',
      }));

      expect(jsonBody(response)).toEqual({
        error: 'invalid_request',
        error_description: 'Duplicate parameter in request: code, redirect_uri',
      });
    });
  });

  describe('CORS', () => {
    it('should answer a preflight from an allowed origin', async () => {
      const { handler } = setup(['https://spa.example.test']);

      const response = await handler(apiEvent({
        method: 'OPTIONS',
        path: '/oauth2/token',
        headers: { origin: 'https://spa.example.test' },
      }));

      expect(response.statusCode).toBe(204);
      expect(header(response, 'Access-Control-Allow-Origin')).toBe('https://spa.example.test');
      expect(header(response, 'Access-Control-Max-Age')).toBe('86400');
    });

    it('should answer a preflight from another origin without CORS headers', async () => {
      const { handler } = setup(['https://spa.example.test']);

      const response = await handler(apiEvent({
        method: 'OPTIONS',
        path: '/oauth2/token',
        headers: { origin: 'https://evil.example.org' },
      }));

      expect(response.statusCode).toBe(204);
      expect(header(response, 'Access-Control-Allow-Origin')).toBeUndefined();
    });

    it('should add CORS headers to error responses for an allowed origin', async () => {
      const { handler } = setup(['https://spa.example.test']);

      const response = await handler(formPost('/oauth2/token', {}, { origin: 'https://spa.example.test' }));

      expect(response.statusCode).toBe(400);
      expect(header(response, 'Access-Control-Allow-Origin')).toBe('https://spa.example.test');
    });

    it('should match allowed origins exactly or by subdomain wildcard', () => {
      const allowed = ['https://spa.example.test', 'https://*.apps.example.test'];

      expect(getAllowedOrigin('https://spa.example.test', allowed)).toBe('https://spa.example.test');
      expect(getAllowedOrigin('https://one.apps.example.test', allowed)).toBe('https://one.apps.example.test');
      expect(getAllowedOrigin('https://evil.example.org', allowed)).toBeUndefined();
      expect(getAllowedOrigin('https://evil.org/x.apps.example.test', allowed)).toBeUndefined();
      expect(getAllowedOrigin('https://oneXapps.example.test', allowed)).toBeUndefined();
      expect(getAllowedOrigin(undefined, allowed)).toBeUndefined();
    });

    it('should allow any origin when none are configured', () => {
      expect(getAllowedOrigin('https://anything.example.org', [])).toBe('https://anything.example.org');
    });
  });
});
