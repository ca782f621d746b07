/**
 * AuthGate - TOTP Engine
 *
 * HOTP (RFC 4226) and TOTP (RFC 6238) codes from otplib with HMAC-SHA1 and
 * 6 digits, plus backup code generation and hashing.
 *
 * Secrets are 20 random bytes (160 bits, the RFC 4226 recommendation)
 * carried as 32 unpadded Base32 characters. Codes are compared in constant
 * time across the whole drift window.
 *
 * @module auth_mfa_totp/totp
 * @see RFC 4226 - HOTP: An HMAC-Based One-Time Password Algorithm
 * @see RFC 6238 - TOTP: Time-Based One-Time Password Algorithm
 */

import { authenticator } from 'otplib';
import * as QRCode from 'qrcode';
import { TotpDefaults, constantTimeEqual, hashToken, randomString } from '@authgate/shared';

// =============================================================================
// Constants
// =============================================================================

/** Secret size in bytes */
export const SECRET_BYTES = 20;

/** Encoded secret length: 20 bytes in Base32 */
export const SECRET_LENGTH = 32;

const BASE32_PATTERN = /^[A-Z2-7]+=*$/i;

const CODE_PATTERN = /^\d{6}$/;

const BACKUP_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const BACKUP_CODE_LENGTH = 8;

// =============================================================================
// Secrets
// =============================================================================

export function isBase32(secret: string): boolean {
    return BASE32_PATTERN.test(secret);
}

/**
 * A well-formed secret: 32 Base32 characters, exactly 160 bits.
 */
export function isValidSecret(secret: string): boolean {
    return secret.length === SECRET_LENGTH && isBase32(secret);
}

export function generateSecret(): string {
    return authenticator.generateSecret(SECRET_BYTES);
}

// =============================================================================
// HOTP / TOTP
// =============================================================================

/**
 * An authenticator pinned to the start of one time step. otplib derives
 * the HOTP counter as floor(epoch / step), so this yields the code for
 * exactly that counter.
 */
function generatorFor(counter: number, period: number) {
    return authenticator.clone({
        epoch: counter * period * 1000,
        step: period,
        digits: TotpDefaults.DIGITS,
    });
}

/**
 * RFC 4226 HOTP value for a counter.
 *
 * @throws Error when the secret is not valid Base32
 */
export function hotp(secret: string, counter: number): string {
    if (!isBase32(secret)) {
        throw new Error('TOTP secret is not valid Base32');
    }
    return generatorFor(counter, TotpDefaults.PERIOD).generate(secret.toUpperCase());
}

export function timeStep(epochSeconds: number, period: number = TotpDefaults.PERIOD): number {
    return Math.floor(epochSeconds / period);
}

export function totp(secret: string, epochSeconds: number, period: number = TotpDefaults.PERIOD): string {
    return hotp(secret, timeStep(epochSeconds, period));
}

export interface VerifyOptions {
    /** Accepted drift in time steps either side of the current one */
    window: number;
    period: number;
}

/**
 * Check a submitted code against every step in [c - window, c + window].
 * All candidate steps are compared; negative counters are skipped.
 */
export function verifyTotp(
    secret: string,
    code: string,
    epochSeconds: number,
    options: VerifyOptions = { window: TotpDefaults.WINDOW, period: TotpDefaults.PERIOD }
): boolean {
    if (!CODE_PATTERN.test(code) || !isBase32(secret)) {
        return false;
    }

    const key = secret.toUpperCase();
    const current = timeStep(epochSeconds, options.period);
    let matched = false;
    for (let counter = current - options.window; counter <= current + options.window; counter++) {
        if (counter < 0) {
            continue;
        }
        if (constantTimeEqual(generatorFor(counter, options.period).generate(key), code)) {
            matched = true;
        }
    }
    return matched;
}

// =============================================================================
// Backup Codes
// =============================================================================

/**
 * Generate distinct single-use backup codes formatted XXXX-XXXX.
 */
export function generateBackupCodes(count: number = TotpDefaults.BACKUP_CODES_COUNT): string[] {
    const codes = new Set<string>();
    while (codes.size < count) {
        const raw = randomString(BACKUP_CODE_ALPHABET, BACKUP_CODE_LENGTH);
        codes.add(`${raw.slice(0, 4)}-${raw.slice(4)}`);
    }
    return [...codes];
}

/** Strip separators and whitespace, uppercase */
export function normalizeBackupCode(code: string): string {
    return code.replace(/[\s-]/g, '').toUpperCase();
}

/** SHA-256 hex of the normalized code */
export function hashBackupCode(code: string): string {
    return hashToken(normalizeBackupCode(code));
}

/**
 * The stored hash matching a submitted backup code, or null. Every stored
 * hash is compared.
 */
export function findBackupCodeHash(code: string, hashes: readonly string[]): string | null {
    const candidate = hashBackupCode(code);
    let found: string | null = null;
    for (const stored of hashes) {
        if (constantTimeEqual(candidate, stored)) {
            found = stored;
        }
    }
    return found;
}

export function verifyBackupCode(code: string, hashes: readonly string[]): boolean {
    return findBackupCodeHash(code, hashes) !== null;
}

// =============================================================================
// Provisioning
// =============================================================================

/**
 * Key URI understood by authenticator apps.
 *
 * @see https://github.com/google/google-authenticator/wiki/Key-Uri-Format
 */
export function totpUri(
    secret: string,
    issuer: string,
    accountName: string,
    period: number = TotpDefaults.PERIOD
): string {
    const uri = authenticator
        .clone({ step: period, digits: TotpDefaults.DIGITS })
        .keyuri(accountName, issuer, secret);

    // algorithm, digits and period are always explicit
    const present = new URL(uri).searchParams;
    const required: Array<[string, string]> = [
        ['algorithm', 'SHA1'],
        ['digits', String(TotpDefaults.DIGITS)],
        ['period', String(period)],
    ];
    const missing = required.filter(([name]) => !present.has(name));
    return missing.length === 0
        ? uri
        : `${uri}&${missing.map(([name, value]) => `${name}=${value}`).join('&')}`;
}

/**
 * Render a key URI as a PNG data URL for display during setup.
 */
export async function renderQrCode(uri: string): Promise<string> {
    return QRCode.toDataURL(uri, {
        errorCorrectionLevel: 'M',
        margin: 2,
        width: 256,
    });
}
