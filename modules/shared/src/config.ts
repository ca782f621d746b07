/**
 * AuthGate - Server Configuration
 *
 * Environment variables are read once into an immutable `ServerConfig`
 * that handlers pass to services at construction.
 */

import { DefaultLifetimes, TotpDefaults } from './constants';

// =============================================================================
// Types
// =============================================================================

export type SigningConfig =
    | { readonly kind: 'kms'; readonly keyId: string; readonly kmsKeyId: string }
    | { readonly kind: 'local'; readonly keyId: string; readonly privateKeyPem: string };

export interface LifetimeConfig {
    readonly authorizationCode: number;
    readonly idToken: number;
    readonly session: number;
    readonly mfaPending: number;
}

export interface TotpConfig {
    readonly issuer: string;
    readonly period: number;
    readonly window: number;
    readonly backupCodesCount: number;
}

export interface ServerConfig {
    readonly issuer: string;
    readonly tableName: string;
    readonly region?: string;
    readonly signing: SigningConfig;
    readonly lifetimes: LifetimeConfig;
    readonly totp: TotpConfig;
    readonly loginUrl: string;
    /** Empty means any origin */
    readonly allowedOrigins: readonly string[];
    readonly clientsFile?: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

// =============================================================================
// Environment Validation
// =============================================================================

export function requireEnv(env: Env, name: string): string {
    const value = env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

export function optionalEnv(env: Env, name: string): string | undefined {
    const value = env[name];
    return value ? value : undefined;
}

export function optionalNumericEnv(env: Env, name: string, defaultValue: number): number {
    const value = env[name];
    if (!value) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 0) {
        throw new Error(`Invalid numeric value for ${name}: ${value}`);
    }
    return parsed;
}

function signingConfig(env: Env): SigningConfig {
    const keyId = requireEnv(env, 'KEY_ID');
    const kmsKeyId = optionalEnv(env, 'KMS_KEY_ID');
    if (kmsKeyId) {
        return { kind: 'kms', keyId, kmsKeyId };
    }
    const privateKeyPem = optionalEnv(env, 'SIGNING_PRIVATE_KEY');
    if (privateKeyPem) {
        return { kind: 'local', keyId, privateKeyPem };
    }
    throw new Error('Missing required environment variable: KMS_KEY_ID or SIGNING_PRIVATE_KEY');
}

// =============================================================================
// Loader
// =============================================================================

export function loadServerConfig(env: Env = process.env): ServerConfig {
    const issuer = requireEnv(env, 'ISSUER').replace(/\/+$/, '');

    return {
        issuer,
        tableName: requireEnv(env, 'TABLE_NAME'),
        region: optionalEnv(env, 'AWS_REGION'),
        signing: signingConfig(env),
        lifetimes: {
            authorizationCode: optionalNumericEnv(env, 'AUTH_CODE_TTL', DefaultLifetimes.AUTHORIZATION_CODE),
            idToken: optionalNumericEnv(env, 'ID_TOKEN_TTL', DefaultLifetimes.ID_TOKEN),
            session: optionalNumericEnv(env, 'SESSION_TTL', DefaultLifetimes.SESSION),
            mfaPending: optionalNumericEnv(env, 'MFA_PENDING_TTL', DefaultLifetimes.MFA_PENDING),
        },
        totp: {
            issuer: optionalEnv(env, 'TOTP_ISSUER') ?? TotpDefaults.ISSUER,
            period: optionalNumericEnv(env, 'TOTP_PERIOD', TotpDefaults.PERIOD),
            window: optionalNumericEnv(env, 'TOTP_WINDOW', TotpDefaults.WINDOW),
            backupCodesCount: optionalNumericEnv(env, 'BACKUP_CODES_COUNT', TotpDefaults.BACKUP_CODES_COUNT),
        },
        loginUrl: optionalEnv(env, 'LOGIN_URL') ?? `${issuer}/login`,
        allowedOrigins: (optionalEnv(env, 'ALLOWED_ORIGINS') ?? '')
            .split(',')
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0),
        clientsFile: optionalEnv(env, 'CLIENTS_FILE'),
    };
}
