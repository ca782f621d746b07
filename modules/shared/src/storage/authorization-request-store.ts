/**
 * AuthGate - Pending Authorization Store
 *
 * Parks a validated /authorize request while the user signs in. The resume
 * endpoint takes it back exactly once: the read is a DeleteItem returning
 * the old row, so a request id cannot mint two codes.
 *
 * @module storage/authorization-request-store
 */

import { DeleteCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { PendingAuthorization, PendingAuthorizationItem } from '../../../shared_types/session';
import type { Clock } from '../clock';
import { toIsoString } from '../clock';
import { KeyPrefixes } from '../constants';
import { generateSecureRandom } from '../crypto';
import { isPendingAuthorizationItem } from '../type-guards';
import { withRetry } from './retry';

export type PendingAuthorizationInput = Omit<PendingAuthorization, 'requestId' | 'expiresAt'>;

export interface AuthorizationRequestStore {
    /** Persist a request and return its id */
    save(request: PendingAuthorizationInput): Promise<PendingAuthorization>;
    /** Remove and return a live request; null when missing or expired */
    take(requestId: string, now: number): Promise<PendingAuthorization | null>;
}

export class DynamoAuthorizationRequestStore implements AuthorizationRequestStore {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string,
        private readonly clock: Clock,
        private readonly lifetimeSeconds: number
    ) {}

    async save(request: PendingAuthorizationInput): Promise<PendingAuthorization> {
        const now = this.clock();
        const pending: PendingAuthorization = {
            ...request,
            requestId: generateSecureRandom(24),
            expiresAt: now + this.lifetimeSeconds,
        };
        const { requestId, ...fields } = pending;
        const timestamp = toIsoString(now);

        const item: PendingAuthorizationItem = {
            ...fields,
            PK: `${KeyPrefixes.SESSION}${requestId}`,
            SK: 'METADATA',
            GSI1PK: `${KeyPrefixes.CLIENT}${pending.clientId}`,
            GSI1SK: `${KeyPrefixes.SESSION}${timestamp}`,
            entityType: 'PENDING_AUTHORIZATION',
            ttl: pending.expiresAt,
            createdAt: timestamp,
            updatedAt: timestamp,
        };

        await withRetry(() => this.client.send(
            new PutCommand({
                TableName: this.tableName,
                Item: item,
                ConditionExpression: 'attribute_not_exists(PK)',
            })
        ));

        return pending;
    }

    async take(requestId: string, now: number): Promise<PendingAuthorization | null> {
        const result = await withRetry(() => this.client.send(
            new DeleteCommand({
                TableName: this.tableName,
                Key: { PK: `${KeyPrefixes.SESSION}${requestId}`, SK: 'METADATA' },
                ReturnValues: 'ALL_OLD',
            })
        ));

        const item = result.Attributes;
        if (!item || !isPendingAuthorizationItem(item) || item.expiresAt <= now) {
            return null;
        }

        return {
            requestId,
            clientId: item.clientId,
            redirectUri: item.redirectUri,
            scope: item.scope,
            ...(item.state !== undefined && { state: item.state }),
            ...(item.nonce !== undefined && { nonce: item.nonce }),
            ...(item.codeChallenge !== undefined && { codeChallenge: item.codeChallenge }),
            ...(item.codeChallengeMethod !== undefined && { codeChallengeMethod: item.codeChallengeMethod }),
            expiresAt: item.expiresAt,
        };
    }
}
