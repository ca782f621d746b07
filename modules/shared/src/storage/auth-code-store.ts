/**
 * AuthGate - Authorization Code Store
 *
 * Codes are written once, redeemed at most once, and swept after expiry.
 *
 * Redemption is a single conditional UpdateItem: `used` flips to true only
 * while it is false and `expiresAt > now`, returning the previous row. Two
 * token requests racing on one code cannot both see a row, whichever Lambda
 * container handles them.
 *
 * @see RFC 6749 Section 4.1.2 - the client MUST NOT use the code more than once
 *
 * @module storage/auth-code-store
 */

import {
    DeleteCommand,
    PutCommand,
    QueryCommand,
    ScanCommand,
    UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { OAuthClient } from '../../../shared_types/client';
import type { AuthCodeItem, AuthorizationCode, CodeChallengeMethod } from '../../../shared_types/token';
import type { Clock } from '../clock';
import { toIsoString } from '../clock';
import { KeyPrefixes } from '../constants';
import { generateSecureRandom, hashToken } from '../crypto';
import { isAuthCodeItem } from '../type-guards';
import { isConditionalCheckFailed, withRetry } from './retry';

// =============================================================================
// Port
// =============================================================================

/**
 * The request-derived fields bound into a code.
 */
export interface CodeRequest {
    readonly redirectUri: string;
    readonly scope: string;
    readonly codeChallenge?: string;
    readonly codeChallengeMethod?: CodeChallengeMethod;
    readonly nonce?: string;
}

export interface AuthorizationCodeStore {
    /** Mint and persist a fresh unused code */
    create(client: OAuthClient, request: CodeRequest, userId: string, username: string): Promise<AuthorizationCode>;
    /** Atomically mark a live code used; null when missing, expired or already used */
    redeem(code: string, now: number): Promise<AuthorizationCode | null>;
    /** Delete codes past expiry; returns the number deleted */
    sweepExpired(now: number): Promise<number>;
    /** Delete every code issued to a client; returns the number deleted */
    revokeByClient(clientId: string): Promise<number>;
}

/** Code entropy: 32 random bytes, base64url */
const CODE_BYTES = 32;

/**
 * Build a new code record. `expiresAt` is exactly `issuedAt + lifetime`.
 */
export function mintAuthorizationCode(
    client: OAuthClient,
    request: CodeRequest,
    userId: string,
    username: string,
    issuedAt: number,
    lifetimeSeconds: number
): AuthorizationCode {
    return {
        code: generateSecureRandom(CODE_BYTES),
        clientId: client.clientId,
        userId,
        username,
        redirectUri: request.redirectUri,
        scope: request.scope,
        ...(request.codeChallenge !== undefined && {
            codeChallenge: request.codeChallenge,
            codeChallengeMethod: request.codeChallengeMethod ?? 'S256',
        }),
        ...(request.nonce !== undefined && { nonce: request.nonce }),
        issuedAt,
        expiresAt: issuedAt + lifetimeSeconds,
        used: false,
    };
}

function codeKey(code: string): { PK: `CODE#${string}`; SK: 'METADATA' } {
    return { PK: `${KeyPrefixes.CODE}${hashToken(code)}`, SK: 'METADATA' };
}

function fromItem(item: AuthCodeItem, code: string): AuthorizationCode {
    return {
        code,
        clientId: item.clientId,
        userId: item.userId,
        username: item.username,
        redirectUri: item.redirectUri,
        scope: item.scope,
        ...(item.codeChallenge !== undefined && {
            codeChallenge: item.codeChallenge,
            codeChallengeMethod: item.codeChallengeMethod ?? 'S256',
        }),
        ...(item.nonce !== undefined && { nonce: item.nonce }),
        issuedAt: item.issuedAt,
        expiresAt: item.expiresAt,
        used: item.used,
        ...(item.usedAt !== undefined && { usedAt: item.usedAt }),
    };
}

// =============================================================================
// DynamoDB Adapter
// =============================================================================

export class DynamoAuthorizationCodeStore implements AuthorizationCodeStore {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string,
        private readonly clock: Clock,
        private readonly lifetimeSeconds: number
    ) {}

    async create(
        oauthClient: OAuthClient,
        request: CodeRequest,
        userId: string,
        username: string
    ): Promise<AuthorizationCode> {
        const authCode = mintAuthorizationCode(oauthClient, request, userId, username, this.clock(), this.lifetimeSeconds);
        const timestamp = toIsoString(authCode.issuedAt);
        const { code: _code, ...fields } = authCode;

        const item: AuthCodeItem = {
            ...fields,
            ...codeKey(authCode.code),
            GSI1PK: `${KeyPrefixes.CLIENT}${authCode.clientId}`,
            GSI1SK: `${KeyPrefixes.CODE}${authCode.issuedAt}`,
            entityType: 'AUTH_CODE',
            ttl: authCode.expiresAt,
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

        return authCode;
    }

    async redeem(code: string, now: number): Promise<AuthorizationCode | null> {
        try {
            const result = await withRetry(() => this.client.send(
                new UpdateCommand({
                    TableName: this.tableName,
                    Key: codeKey(code),
                    UpdateExpression: 'SET #used = :true, usedAt = :now, updatedAt = :updatedAt',
                    ConditionExpression: 'attribute_exists(PK) AND #used = :false AND expiresAt > :now',
                    ExpressionAttributeNames: {
                        '#used': 'used',
                    },
                    ExpressionAttributeValues: {
                        ':true': true,
                        ':false': false,
                        ':now': now,
                        ':updatedAt': toIsoString(now),
                    },
                    ReturnValues: 'ALL_OLD',
                })
            ));

            const previous = result.Attributes;
            if (!previous || !isAuthCodeItem(previous)) {
                return null;
            }
            return fromItem(previous, code);
        } catch (error) {
            // Missing, expired and used codes are indistinguishable to the caller
            if (isConditionalCheckFailed(error)) {
                return null;
            }
            throw error;
        }
    }

    async sweepExpired(now: number): Promise<number> {
        let deleted = 0;
        let startKey: Record<string, unknown> | undefined;

        do {
            const page = await withRetry(() => this.client.send(
                new ScanCommand({
                    TableName: this.tableName,
                    FilterExpression: 'entityType = :type AND expiresAt <= :now',
                    ProjectionExpression: 'PK, SK',
                    ExpressionAttributeValues: {
                        ':type': 'AUTH_CODE',
                        ':now': now,
                    },
                    ExclusiveStartKey: startKey,
                })
            ));

            for (const item of page.Items ?? []) {
                if (await this.deleteIfExpired(item, now)) {
                    deleted++;
                }
            }
            startKey = page.LastEvaluatedKey;
        } while (startKey);

        return deleted;
    }

    async revokeByClient(clientId: string): Promise<number> {
        let deleted = 0;
        let startKey: Record<string, unknown> | undefined;

        do {
            const page = await withRetry(() => this.client.send(
                new QueryCommand({
                    TableName: this.tableName,
                    IndexName: 'GSI1',
                    KeyConditionExpression: 'GSI1PK = :pk AND begins_with(GSI1SK, :prefix)',
                    ProjectionExpression: 'PK, SK',
                    ExpressionAttributeValues: {
                        ':pk': `${KeyPrefixes.CLIENT}${clientId}`,
                        ':prefix': KeyPrefixes.CODE,
                    },
                    ExclusiveStartKey: startKey,
                })
            ));

            for (const item of page.Items ?? []) {
                await withRetry(() => this.client.send(
                    new DeleteCommand({
                        TableName: this.tableName,
                        Key: { PK: item.PK, SK: item.SK },
                    })
                ));
                deleted++;
            }
            startKey = page.LastEvaluatedKey;
        } while (startKey);

        return deleted;
    }

    private async deleteIfExpired(key: Record<string, unknown>, now: number): Promise<boolean> {
        try {
            await withRetry(() => this.client.send(
                new DeleteCommand({
                    TableName: this.tableName,
                    Key: { PK: key.PK, SK: key.SK },
                    ConditionExpression: 'expiresAt <= :now',
                    ExpressionAttributeValues: { ':now': now },
                })
            ));
            return true;
        } catch (error) {
            // Already deleted by TTL or a concurrent sweep
            if (isConditionalCheckFailed(error)) {
                return false;
            }
            throw error;
        }
    }
}
