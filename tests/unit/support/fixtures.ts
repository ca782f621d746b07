/**
 * Shared Test Fixtures
 *
 * A controllable clock, a local RSA signer, sample clients and users, and
 * an audit sink that keeps every entry for assertions.
 */

import { LocalKeySigner, hashToken } from '@authgate/shared';
import type { Clock, CredentialSettings, Result, TotpConfig } from '@authgate/shared';
import type { AuditAction, AuditLogEntry, AuditSink } from '../../../modules/shared_types/audit';
import type { OAuthClient } from '../../../modules/shared_types/client';
import type { UserRecord } from '../../../modules/shared_types/user';

export const ISSUER = 'https://auth.example.test';
export const NOW = 1_700_000_000;
export const CLIENT_SECRET = 'test-secret';
export const PASSWORD = 'correct-horse-battery';

/** One key per test run; generating RSA keys is slow */
export const signer = LocalKeySigner.generate('test-key-1');

// =============================================================================
// Results
// =============================================================================

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected ok, got error: ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

export function unwrapError<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error(`Expected an error, got: ${JSON.stringify(result.value)}`);
  }
  return result.error;
}

// =============================================================================
// Clock
// =============================================================================

export interface TestClock {
  readonly clock: Clock;
  set(epochSeconds: number): void;
  advance(seconds: number): void;
}

export function testClock(start: number = NOW): TestClock {
  let current = start;
  return {
    clock: () => current,
    set: (epochSeconds) => {
      current = epochSeconds;
    },
    advance: (seconds) => {
      current += seconds;
    },
  };
}

export function credentialSettings(clock: Clock): CredentialSettings {
  return {
    issuer: ISSUER,
    signer,
    clock,
    sessionTtl: 86400,
    mfaPendingTtl: 300,
  };
}

export const totpSettings: TotpConfig = {
  issuer: 'AuthGate',
  period: 30,
  window: 1,
  backupCodesCount: 10,
};

// =============================================================================
// Audit
// =============================================================================

export interface AuditCollector {
  readonly sink: AuditSink;
  readonly entries: AuditLogEntry[];
  actions(): AuditAction[];
  find(action: AuditAction): AuditLogEntry | undefined;
}

export function auditCollector(): AuditCollector {
  const entries: AuditLogEntry[] = [];
  return {
    sink: (entry) => {
      entries.push(entry);
    },
    entries,
    actions: () => entries.map((entry) => entry.action),
    find: (action) => entries.find((entry) => entry.action === action),
  };
}

// =============================================================================
// Clients
// =============================================================================

export function confidentialClient(overrides: Partial<OAuthClient> = {}): OAuthClient {
  return {
    clientId: 'web-app',
    clientName: 'Web App',
    confidential: true,
    secretHash: hashToken(CLIENT_SECRET),
    redirectUris: ['https://app.example.test/callback'],
    allowedScopes: ['openid', 'profile', 'email'],
    allowedGrantTypes: ['authorization_code', 'refresh_token'],
    requirePkce: false,
    accessTokenTTL: 3600,
    refreshTokenTTL: 86400,
    enabled: true,
    ...overrides,
  };
}

export function publicClient(overrides: Partial<OAuthClient> = {}): OAuthClient {
  return {
    clientId: 'spa-app',
    clientName: 'Single Page App',
    confidential: false,
    redirectUris: ['https://spa.example.test/callback', 'http://localhost:3000/callback'],
    allowedScopes: ['openid', 'profile'],
    allowedGrantTypes: ['authorization_code'],
    requirePkce: true,
    accessTokenTTL: 900,
    refreshTokenTTL: 86400,
    enabled: true,
    ...overrides,
  };
}

// =============================================================================
// Users
// =============================================================================

export function userRecord(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    userId: 'user-1',
    username: 'alice',
    email: 'alice@example.test',
    emailVerified: true,
    status: 'ACTIVE',
    roles: ['USER'],
    mfaEnabled: false,
    updatedAt: '2023-11-01T00:00:00.000Z',
    ...overrides,
  };
}
