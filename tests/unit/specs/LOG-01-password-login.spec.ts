/**
 * LOG-01: Password Login
 *
 * Validates POST /auth/login: a full session for accounts without MFA, an
 * MFA-pending credential for enrolled accounts, and one indistinguishable
 * error for every failure.
 */

import { describe, it, expect } from 'vitest';
import { argon2id } from 'hash-wasm';
import { ErrorMessages, verifySessionCredential } from '@authgate/shared';
import { INVALID_CREDENTIALS, createLoginHandler } from '@authgate/auth-password';
import type { PasswordVerifier } from '@authgate/auth-password';
import { apiEvent, formPost, header, jsonBody, jsonRequest, stringProp } from '../support/http';
import { MemoryUserStore } from '../support/stores';
import { NOW, PASSWORD, auditCollector, credentialSettings, testClock, userRecord } from '../support/fixtures';

/** Stored hashes in these tests are `plain:<password>` */
const plainVerifier: PasswordVerifier = async (password, hash) => hash === `plain:${password}`;

/** `null` leaves the default argon2 verifier in place */
function setup(verifyPassword: PasswordVerifier | null = plainVerifier) {
  const time = testClock();
  const audit = auditCollector();
  const users = new MemoryUserStore();
  const passwordHash = `plain:${PASSWORD}`;
  users.add(userRecord({ passwordHash }));
  users.add(userRecord({ userId: 'user-2', username: 'bob', passwordHash }), {
    mfaEnabled: true,
    mfaSecret: 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ',
    mfaBackupCodes: [],
  });
  users.add(userRecord({ userId: 'user-3', username: 'carol', passwordHash, status: 'SUSPENDED' }));
  users.add(userRecord({ userId: 'user-4', username: 'dave' }));

  const credentials = credentialSettings(time.clock);
  const handler = createLoginHandler({
    users,
    credentials,
    ...(verifyPassword !== null && { verifyPassword }),
    auditSink: audit.sink,
  });
  return { handler, users, audit, credentials, time };
}

function login(username: string, password: string) {
  return jsonRequest('POST', '/auth/login', { username, password });
}

describe('LOG-01: Password Login', () => {
  describe('successful login', () => {
    it('should issue a full session and cookie without MFA', async () => {
      const { handler, audit, credentials } = setup();

      const response = await handler(login('alice', PASSWORD));

      expect(response.statusCode).toBe(200);
      const body = jsonBody(response);
      expect(body).toMatchObject({
        tokenType: 'Bearer',
        expiresIn: 86400,
        username: 'alice',
        roles: ['USER'],
        mfaRequired: false,
      });
      const token = stringProp(body, 'token');
      expect(response.cookies).toEqual([
        `session=${token}; Path=/; Max-Age=86400; HttpOnly; Secure; SameSite=Lax`,
      ]);
      expect(await verifySessionCredential(token, credentials)).toEqual({
        userId: 'user-1',
        username: 'alice',
        roles: ['USER'],
        mfaPending: false,
        issuedAt: NOW,
        expiresAt: NOW + 86400,
      });

      const entry = audit.find('LOGIN_SUCCESS');
      expect(entry?.actor).toEqual({ type: 'USER', sub: 'user-1', username: 'alice' });
      expect(entry?.details).toEqual({ method: 'password', mfaPending: false });
    });

    it('should issue an MFA-pending credential to an enrolled account', async () => {
      const { handler, audit, credentials } = setup();

      const response = await handler(login('bob', PASSWORD));

      expect(response.statusCode).toBe(200);
      const body = jsonBody(response);
      expect(body.mfaRequired).toBe(true);
      expect(body.expiresIn).toBe(300);
      expect(body.token).toBeUndefined();
      expect(response.cookies).toBeUndefined();

      const principal = await verifySessionCredential(stringProp(body, 'mfaToken'), credentials);
      expect(principal?.mfaPending).toBe(true);
      expect(principal?.expiresAt).toBe(NOW + 300);
      expect(audit.find('LOGIN_SUCCESS')?.details).toEqual({ method: 'password', mfaPending: true });
    });

    it('should accept a form-encoded body', async () => {
      const { handler } = setup();

      const response = await handler(formPost('/auth/login', { username: 'alice', password: PASSWORD }));

      expect(response.statusCode).toBe(200);
    });

    it('should verify argon2id hashes by default', async () => {
      const passwordHash = await argon2id({
        password: PASSWORD,
        salt: new Uint8Array(16).fill(7),
        parallelism: 1,
        iterations: 1,
        memorySize: 64,
        hashLength: 32,
        outputType: 'encoded',
      });
      const { handler, users } = setup(null);
      users.add(userRecord({ passwordHash }));

      const accepted = await handler(login('alice', PASSWORD));
      const refused = await handler(login('alice', 'wrong-password'));

      expect(accepted.statusCode).toBe(200);
      expect(refused.statusCode).toBe(401);
    });
  });

  describe('failed login', () => {
    const cases: Array<[string, string, string]> = [
      ['an unknown username', 'mallory', 'user_not_found'],
      ['a suspended account', 'carol', 'account_inactive'],
      ['an account without a password', 'dave', 'no_password_set'],
    ];

    it.each(cases)('should give the same answer for %s', async (_label, username, reason) => {
      const { handler, audit } = setup();

      const response = await handler(login(username, PASSWORD));

      expect(response.statusCode).toBe(401);
      expect(jsonBody(response)).toEqual({ error: 'invalid_grant', error_description: INVALID_CREDENTIALS });
      expect(audit.find('LOGIN_FAILURE')?.details).toEqual({ method: 'password', username, reason });
    });

    it('should refuse a wrong password', async () => {
      const { handler, audit } = setup();

      const response = await handler(login('alice', 'wrong-password'));

      expect(response.statusCode).toBe(401);
      expect(jsonBody(response).error_description).toBe('Invalid username or password');
      expect(response.cookies).toBeUndefined();
      expect(audit.find('LOGIN_FAILURE')?.actor).toEqual({ type: 'ANONYMOUS' });
    });

    it('should treat a verifier error as a wrong password', async () => {
      const { handler, audit } = setup(async () => {
        throw new Error('Malformed hash');
      });

      const response = await handler(login('alice', PASSWORD));

      expect(response.statusCode).toBe(401);
      expect(audit.find('LOGIN_FAILURE')?.details).toEqual({
        method: 'password',
        username: 'alice',
        reason: 'invalid_password',
      });
    });
  });

  describe('request framing', () => {
    it('should require username and password', async () => {
      const { handler } = setup();

      const response = await handler(jsonRequest('POST', '/auth/login', { username: 'alice' }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response)).toEqual({
        error: 'invalid_request',
        error_description: 'username and password are required',
      });
    });

    it('should reject an unparseable body', async () => {
      const { handler } = setup();

      const response = await handler(apiEvent({
        method: 'POST',
        path: '/auth/login',
        headers: { 'content-type': 'application/json' },
        body: '{',
      }));

      expect(response.statusCode).toBe(400);
      expect(jsonBody(response).error_description).toBe(ErrorMessages.INVALID_BODY);
    });

    it('should only allow POST', async () => {
      const { handler } = setup();

      const response = await handler(apiEvent({ method: 'GET', path: '/auth/login' }));

      expect(response.statusCode).toBe(405);
      expect(header(response, 'Allow')).toBe('POST');
    });
  });
});
