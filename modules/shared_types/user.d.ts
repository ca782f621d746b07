/**
 * AuthGate - User Entity Types
 *
 * User profile, credentials and TOTP enrollment stored in DynamoDB.
 *
 * Key Pattern:
 *   PK: USER#<user_id>
 *   SK: PROFILE
 *   GSI1PK: USERNAME#<lowercased username>
 *   GSI1SK: USER (for username lookup)
 *
 * Enrollment invariant: mfaSecret and mfaBackupCodes are present iff
 * mfaEnabled is true. Backup code hashes only leave the set one at a time,
 * except when regeneration replaces the whole set.
 *
 * @see RFC 6238 - TOTP: Time-Based One-Time Password Algorithm
 */

import type { BaseItem } from './base';

export type UserStatus = 'ACTIVE' | 'SUSPENDED' | 'PENDING_VERIFICATION';

// =============================================================================
// User Record
// =============================================================================

/**
 * Directory view of a user consumed by login, token and userinfo flows.
 */
export interface UserRecord {
    userId: string;
    username: string;
    email?: string;
    emailVerified: boolean;
    status: UserStatus;
    roles: readonly string[];
    /** Argon2id password hash */
    passwordHash?: string;
    /** Mirrors the enrollment flag so login can branch without a second read */
    mfaEnabled: boolean;
    /** ISO 8601 last update timestamp */
    updatedAt: string;
}

/**
 * TOTP enrollment state carried on the user record.
 */
export interface TotpEnrollment {
    mfaEnabled: boolean;
    /** Base32 secret, present only while enabled */
    mfaSecret?: string;
    /** SHA-256 hex hashes of the remaining backup codes */
    mfaBackupCodes: readonly string[];
    /** ISO 8601 timestamp of enrollment */
    mfaEnabledAt?: string;
}

// =============================================================================
// User Entity
// =============================================================================

export interface UserItem extends BaseItem {
    /** PK pattern: USER#<user_id> */
    PK: `USER#${string}`;
    SK: 'PROFILE';
    entityType: 'USER';

    userId: string;
    username: string;
    email?: string;
    emailVerified: boolean;
    status: UserStatus;
    roles: readonly string[];
    passwordHash?: string;

    /** Absent on profiles written before the user ever enrolled */
    mfaEnabled?: boolean;
    mfaSecret?: string;
    /** Stored as a DynamoDB string set so one hash can be removed atomically */
    mfaBackupCodes?: ReadonlySet<string>;
    mfaEnabledAt?: string;
}
