/**
 * AUT-01: Authorization Request Validation
 *
 * Validates the ordering of /authorize checks and where each error goes:
 * failures before the redirect URI is trusted are answered directly, never
 * redirected; later ones go back to the client with state.
 *
 * @see RFC 6749 Section 4.1.2.1 - Error Response
 * @see RFC 7636 Section 4.4.1 - Error Response
 */

import { describe, it, expect } from 'vitest';
import { ErrorMessages } from '@authgate/shared';
import { createAuthorizeHandler } from '@authgate/oauth2-authorize';
import { apiEvent, header, jsonBody, location } from '../support/http';
import { MemoryClientRegistry, MemoryCodeStore, MemoryRequestStore } from '../support/stores';
import {
  ISSUER,
  auditCollector,
  confidentialClient,
  credentialSettings,
  publicClient,
  testClock,
} from '../support/fixtures';

const CALLBACK = 'https://app.example.test/callback';
const SPA_CALLBACK = 'https://spa.example.test/callback';
const CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

function setup() {
  const time = testClock();
  const audit = auditCollector();
  const pendingRequests = new MemoryRequestStore(time.clock);
  const handler = createAuthorizeHandler({
    clients: new MemoryClientRegistry([
      confidentialClient(),
      publicClient(),
      confidentialClient({ clientId: 'retired-app', enabled: false }),
    ]),
    codes: new MemoryCodeStore(time.clock),
    pendingRequests,
    credentials: credentialSettings(time.clock),
    loginUrl: `${ISSUER}/login`,
    auditSink: audit.sink,
  });
  return { handler, audit, pendingRequests };
}

function authorize(query: Record<string, string> | string) {
  return apiEvent({ method: 'GET', path: '/oauth2/authorize', query });
}

describe('AUT-01: Authorization Request Validation', () => {
  describe('direct errors (redirect URI not trusted)', () => {
    it('should reject a missing client_id', async () => {
      const { handler } = setup();

      const response = await handler(authorize({ response_type: 'code', redirect_uri: CALLBACK }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'invalid_request',
        error_description: 'Missing required parameter: client_id',
      });
      expect(header(response, 'Location')).toBeUndefined();
    });

    it('should reject an unknown client with 400 invalid_client', async () => {
      const { handler, audit } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'no-such-client',
        redirect_uri: CALLBACK,
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'invalid_client',
        error_description: ErrorMessages.UNKNOWN_CLIENT,
      });
      expect(header(response, 'WWW-Authenticate')).toBeUndefined();
      expect(audit.find('AUTH_CODE_REJECTED')?.details).toEqual({
        clientId: 'no-such-client',
        error: 'invalid_client',
        reason: ErrorMessages.UNKNOWN_CLIENT,
      });
    });

    it('should treat a disabled client as unknown', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'retired-app',
        redirect_uri: CALLBACK,
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error).toBe('invalid_client');
    });

    it('should treat a malformed client_id as unknown', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'web app<script>',
        redirect_uri: CALLBACK,
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error_description).toBe(ErrorMessages.UNKNOWN_CLIENT);
    });

    it('should reject a missing redirect_uri', async () => {
      const { handler } = setup();

      const response = await handler(authorize({ response_type: 'code', client_id: 'web-app' }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error_description).toBe(ErrorMessages.MISSING_REDIRECT_URI);
    });

    it.each([
      'https://evil.example.test/callback',
      'https://app.example.test/callback/',
      'https://app.example.test/callback?x=1',
      'https://APP.example.test/callback',
    ])('should not redirect to an unregistered URI: %s', async (redirectUri) => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'web-app',
        redirect_uri: redirectUri,
        state: 'xyz',
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'invalid_request',
        error_description: ErrorMessages.REDIRECT_URI_MISMATCH,
      });
      expect(header(response, 'Location')).toBeUndefined();
    });

    it('should answer an unsupported response_type directly when the redirect URI is untrusted', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'token',
        client_id: 'web-app',
        redirect_uri: 'https://evil.example.test/callback',
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error).toBe('unsupported_response_type');
    });

    it('should reject duplicated parameters', async () => {
      const { handler } = setup();

      const response = await handler(authorize(
        'response_type=code&client_id=web-app&client_id=spa-app&redirect_uri=https%3A%2F%2Fapp.example.test%2Fcallback'
      ));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'invalid_request',
        error_description: 'Duplicate parameter in request: client_id',
      });
    });

    it('should only allow GET', async () => {
      const { handler } = setup();

      const response = await handler(apiEvent({ method: 'POST', path: '/oauth2/authorize' }));

      expect(response.statusCode).toBe(405);
      expect(header(response, 'Allow')).toBe('GET');
    });
  });

  describe('redirected errors (redirect URI trusted)', () => {
    it('should redirect an unsupported response_type with state', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'token',
        client_id: 'web-app',
        redirect_uri: CALLBACK,
        state: 'xyz',
      }));

      expect(response.statusCode).toBe(302);
      const target = location(response);
      expect(`${target.origin}${target.pathname}`).toBe(CALLBACK);
      expect(target.searchParams.get('error')).toBe('unsupported_response_type');
      expect(target.searchParams.get('error_description')).toBe('response_type must be "code"');
      expect(target.searchParams.get('state')).toBe('xyz');
    });

    it('should redirect a scope the client may not request', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'web-app',
        redirect_uri: CALLBACK,
        scope: 'openid admin',
        state: 'xyz',
      }));

      const target = location(response);
      expect(target.searchParams.get('error')).toBe('invalid_scope');
      expect(target.searchParams.get('error_description')).toBe(ErrorMessages.SCOPE_NOT_ALLOWED);
      expect(target.searchParams.get('state')).toBe('xyz');
    });

    it('should redirect an empty scope as invalid_scope', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'web-app',
        redirect_uri: CALLBACK,
        scope: '',
      }));

      expect(location(response).searchParams.get('error')).toBe('invalid_scope');
    });

    it('should require a code_challenge from a PKCE client', async () => {
      const { handler, pendingRequests } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'spa-app',
        redirect_uri: SPA_CALLBACK,
        state: 'xyz',
      }));

      const target = location(response);
      expect(target.searchParams.get('error')).toBe('invalid_request');
      expect(target.searchParams.get('error_description')).toBe(ErrorMessages.PKCE_REQUIRED);
      expect(target.searchParams.get('state')).toBe('xyz');
      expect(pendingRequests.requests.size).toBe(0);
    });

    it('should reject an unsupported code_challenge_method', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'spa-app',
        redirect_uri: SPA_CALLBACK,
        code_challenge: CHALLENGE,
        code_challenge_method: 'S512',
      }));

      expect(location(response).searchParams.get('error_description')).toBe(ErrorMessages.INVALID_CODE_CHALLENGE_METHOD);
    });

    it('should reject a challenge shorter than 43 characters', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'spa-app',
        redirect_uri: SPA_CALLBACK,
        code_challenge: 'short',
        code_challenge_method: 'S256',
      }));

      expect(location(response).searchParams.get('error_description')).toBe(ErrorMessages.INVALID_CODE_CHALLENGE);
    });

    it('should omit state from the error redirect when none was sent', async () => {
      const { handler } = setup();

      const response = await handler(authorize({
        response_type: 'code',
        client_id: 'web-app',
        redirect_uri: CALLBACK,
        scope: 'admin',
      }));

      expect(location(response).searchParams.has('state')).toBe(false);
    });
  });
});
