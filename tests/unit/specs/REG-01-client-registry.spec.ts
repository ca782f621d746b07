/**
 * REG-01: Client Registry Administration
 *
 * Validates the administrative client API: registration with a one-time
 * secret, reads, policy updates and deletion with code revocation.
 *
 * @see RFC 7591 - OAuth 2.0 Dynamic Client Registration Protocol
 */

import { describe, it, expect } from 'vitest';
import { ErrorMessages, hashToken, issueSessionCredential } from '@authgate/shared';
import { createClientRegistryHandler, toClientView } from '@authgate/client-registry';
import { apiEvent, bearer, header, jsonBody, jsonRequest, stringProp } from '../support/http';
import { MemoryClientRegistry, MemoryCodeStore } from '../support/stores';
import {
  NOW,
  auditCollector,
  confidentialClient,
  credentialSettings,
  publicClient,
  testClock,
} from '../support/fixtures';

function setup() {
  const time = testClock();
  const audit = auditCollector();
  const registry = new MemoryClientRegistry([confidentialClient(), publicClient()]);
  const codes = new MemoryCodeStore(time.clock);
  const credentials = credentialSettings(time.clock);
  const handler = createClientRegistryHandler({
    registry,
    codes,
    clock: time.clock,
    credentials,
    auditSink: audit.sink,
  });

  async function as(roles: string[], mfaPending = false): Promise<Record<string, string>> {
    const credential = await issueSessionCredential(credentials, { userId: 'admin-1', username: 'root', roles }, mfaPending);
    return bearer(credential.token);
  }

  return { handler, registry, codes, audit, admin: () => as(['USER', 'ADMIN']), as };
}

function clientPath(clientId: string, method: string, headers: Record<string, string>, body?: unknown) {
  const path = `/clients/${clientId}`;
  if (body === undefined) {
    return apiEvent({ method, path, headers, pathParameters: { clientId } });
  }
  return { ...jsonRequest(method, path, body, headers), pathParameters: { clientId } };
}

describe('REG-01: Client Registry Administration', () => {
  describe('access control', () => {
    it('should require a credential', async () => {
      const { handler } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {}));

      expect(response.statusCode).toBe(401);
      expect(header(response, 'WWW-Authenticate')).toBe('Bearer error="invalid_token"');
    });

    it('should refuse a caller without the ADMIN role', async () => {
      const { handler, as } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {}, await as(['USER'])));

      expect(response.statusCode).toBe(403);
      expect(jsonBody(response)).toEqual({ error: 'access_denied', error_description: ErrorMessages.ADMIN_REQUIRED });
    });

    it('should refuse an MFA-pending administrator', async () => {
      const { handler, as } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {}, await as(['ADMIN'], true)));

      expect(response.statusCode).toBe(403);
      expect(jsonBody(response).error_description).toBe(ErrorMessages.MFA_VERIFICATION_REQUIRED);
    });
  });

  describe('POST /clients', () => {
    it('should register a confidential client and return its secret once', async () => {
      const { handler, registry, audit, admin } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {
        client_name: 'Reports',
        redirect_uris: ['https://reports.example.test/cb'],
        scope: 'openid profile',
      }, await admin()));

      expect(response.statusCode).toBe(201);
      const body = jsonBody(response);
      const clientId = stringProp(body, 'client_id');
      const secret = stringProp(body, 'client_secret');
      expect(secret).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(body).toEqual({
        client_id: clientId,
        client_name: 'Reports',
        redirect_uris: ['https://reports.example.test/cb'],
        grant_types: ['authorization_code'],
        scope: 'openid profile',
        token_endpoint_auth_method: 'client_secret_basic',
        require_pkce: true,
        access_token_ttl: 3600,
        refresh_token_ttl: 86400,
        enabled: true,
        client_id_issued_at: NOW,
        client_secret: secret,
        client_secret_expires_at: 0,
      });

      const stored = await registry.findClient(clientId);
      expect(stored?.secretHash).toBe(hashToken(secret));
      expect(stored?.confidential).toBe(true);

      const entry = audit.find('CLIENT_CREATED');
      expect(entry?.actor).toEqual({ type: 'USER', sub: 'admin-1', username: 'root' });
      expect(entry?.resource).toEqual({ type: 'OAUTH2_CLIENT', id: clientId });
    });

    it('should register a public client without a secret', async () => {
      const { handler, registry, admin } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {
        redirect_uris: ['http://localhost:8080/cb'],
        token_endpoint_auth_method: 'none',
      }, await admin()));

      expect(response.statusCode).toBe(201);
      const body = jsonBody(response);
      expect(body.client_secret).toBeUndefined();
      expect(body.client_name).toBe('Unnamed client');
      expect(body.scope).toBe('openid');
      const stored = await registry.findClient(stringProp(body, 'client_id'));
      expect(stored?.secretHash).toBeUndefined();
    });

    it('should refuse a public client without PKCE', async () => {
      const { handler, admin } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {
        redirect_uris: ['https://spa2.example.test/cb'],
        token_endpoint_auth_method: 'none',
        require_pkce: false,
      }, await admin()));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'invalid_client_metadata',
        error_description: 'Public clients must require PKCE',
      });
    });

    it('should refuse a plain http redirect URI off localhost', async () => {
      const { handler, admin } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {
        redirect_uris: ['http://reports.example.test/cb'],
      }, await admin()));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error).toBe('invalid_redirect_uri');
    });

    it('should refuse an unsupported grant type', async () => {
      const { handler, admin } = setup();

      const response = await handler(jsonRequest('POST', '/clients', {
        redirect_uris: ['https://reports.example.test/cb'],
        grant_types: ['password'],
      }, await admin()));

      expect(jsonBody(response)).toEqual({
        error: 'invalid_client_metadata',
        error_description: 'Unsupported grant type: password',
      });
    });

    it('should require a JSON body', async () => {
      const { handler, admin } = setup();

      const response = await handler(apiEvent({
        method: 'POST',
        path: '/clients',
        headers: { 'content-type': 'application/x-www-form-urlencoded', ...await admin() },
        body: 'client_name=Reports',
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error_description).toBe('Content-Type must be application/json');
    });

    it('should only allow POST on the collection', async () => {
      const { handler, admin } = setup();

      const response = await handler(apiEvent({ method: 'GET', path: '/clients', headers: await admin() }));

      expect(response.statusCode).toBe(405);
      expect(header(response, 'Allow')).toBe('POST');
    });
  });

  describe('GET /clients/{clientId}', () => {
    it('should return the client without its secret hash', async () => {
      const { handler, admin } = setup();

      const response = await handler(clientPath('web-app', 'GET', await admin()));

      expect(response.statusCode).toBe(200);
      expect(jsonBody(response)).toEqual(toClientView(confidentialClient()));
      expect(jsonBody(response).secretHash).toBeUndefined();
    });

    it('should answer 404 for an unknown client', async () => {
      const { handler, admin } = setup();

      const response = await handler(clientPath('ghost-app', 'GET', await admin()));

      expect(response.statusCode).toBe(404);
      expect(jsonBody(response)).toEqual({ error: 'invalid_request', error_description: 'Client not found' });
    });
  });

  describe('PATCH /clients/{clientId}', () => {
    it('should update policy fields', async () => {
      const { handler, registry, audit, admin } = setup();

      const response = await handler(clientPath('web-app', 'PATCH', await admin(), {
        scope: 'openid',
        enabled: false,
      }));

      expect(response.statusCode).toBe(200);
      expect(jsonBody(response)).toMatchObject({ client_id: 'web-app', scope: 'openid', enabled: false });
      const stored = await registry.findClient('web-app');
      expect(stored?.allowedScopes).toEqual(['openid']);
      expect(stored?.enabled).toBe(false);
      expect(audit.find('CLIENT_UPDATED')?.details).toEqual({ fields: ['allowedScopes', 'enabled'] });
    });

    it('should refuse to change the client identity', async () => {
      const { handler, admin } = setup();

      const response = await handler(clientPath('web-app', 'PATCH', await admin(), { client_id: 'other' }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error_description).toBe('Cannot change client_id');
    });

    it('should refuse to turn PKCE off for a public client', async () => {
      const { handler, admin } = setup();

      const response = await handler(clientPath('spa-app', 'PATCH', await admin(), { require_pkce: false }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error_description).toBe('Public clients must require PKCE');
    });

    it('should refuse an empty update', async () => {
      const { handler, admin } = setup();

      const response = await handler(clientPath('web-app', 'PATCH', await admin(), {}));

      expect(jsonBody(response).error_description).toBe('No updatable fields in request');
    });
  });

  describe('DELETE /clients/{clientId}', () => {
    it('should revoke outstanding codes and delete the client', async () => {
      const { handler, registry, codes, audit, admin } = setup();
      const web = confidentialClient();
      const request = { redirectUri: 'https://app.example.test/callback', scope: 'openid' };
      await codes.create(web, request, 'user-1', 'alice');
      await codes.create(web, request, 'user-1', 'alice');
      await codes.create(publicClient(), { redirectUri: 'https://spa.example.test/callback', scope: 'openid' }, 'user-1', 'alice');

      const response = await handler(clientPath('web-app', 'DELETE', await admin()));

      expect(response.statusCode).toBe(204);
      expect(await registry.findClient('web-app')).toBeNull();
      expect([...codes.codes.values()].map((code) => code.clientId)).toEqual(['spa-app']);
      expect(audit.actions()).toEqual(['AUTH_CODES_REVOKED', 'CLIENT_DELETED']);
      expect(audit.find('AUTH_CODES_REVOKED')?.details).toEqual({ count: 2 });
    });

    it('should answer 404 for an unknown client', async () => {
      const { handler, admin } = setup();

      const response = await handler(clientPath('ghost-app', 'DELETE', await admin()));

      expect(response.statusCode).toBe(404);
    });
  });

  it('should refuse other methods on a client', async () => {
    const { handler, admin } = setup();

    const response = await handler(clientPath('web-app', 'PUT', await admin(), {}));

    expect(response.statusCode).toBe(405);
    expect(header(response, 'Allow')).toBe('GET, PATCH, DELETE');
  });
});
