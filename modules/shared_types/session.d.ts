/**
 * AuthGate - Pending Authorization Entity Types
 *
 * A validated /authorize request parked while the user signs in.
 *
 * Key Pattern:
 *   PK: SESSION#<request_id>
 *   SK: METADATA
 *   GSI1PK: CLIENT#<client_id>
 *   GSI1SK: SESSION#<createdAt>
 *
 * Lifecycle:
 * 1. Stored by /oauth2/authorize when the caller has no session
 * 2. Taken (deleted atomically) by /oauth2/authorize/resume after login
 * 3. Otherwise removed by TTL
 */

import type { BaseItem } from './base';
import type { CodeChallengeMethod } from './token';

/**
 * The parts of a validated authorization request needed to issue a code.
 */
export interface PendingAuthorization {
    requestId: string;
    clientId: string;
    redirectUri: string;
    scope: string;
    state?: string;
    nonce?: string;
    codeChallenge?: string;
    codeChallengeMethod?: CodeChallengeMethod;
    /** Unix epoch seconds */
    expiresAt: number;
}

export interface PendingAuthorizationItem extends BaseItem, Omit<PendingAuthorization, 'requestId'> {
    PK: `SESSION#${string}`;
    SK: 'METADATA';
    entityType: 'PENDING_AUTHORIZATION';
}
