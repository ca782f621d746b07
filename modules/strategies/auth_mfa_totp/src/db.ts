/**
 * AuthGate - TOTP Enrollment Storage
 *
 * Enrollment lives on the user profile item (PK=USER#<id>, SK=PROFILE).
 * Backup code hashes are a DynamoDB string set so a single hash can be
 * consumed with one conditional DELETE; two requests racing on the same
 * code cannot both succeed.
 *
 * @module auth_mfa_totp/db
 */

import { GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { KeyPrefixes, isConditionalCheckFailed, isUserItem, withRetry } from '@authgate/shared';
import type { TotpEnrollment, UserItem } from '../../../shared_types/user';

/**
 * Enrollment may start only from a profile that is not enrolled. A profile
 * with no mfaEnabled attribute has never enrolled.
 */
export const ENABLE_CONDITION =
    'attribute_exists(PK) AND (attribute_not_exists(mfaEnabled) OR mfaEnabled = :disabled)';

export function toEnrollment(item: UserItem): TotpEnrollment {
    return {
        mfaEnabled: item.mfaEnabled === true,
        ...(item.mfaSecret !== undefined && { mfaSecret: item.mfaSecret }),
        mfaBackupCodes: [...(item.mfaBackupCodes ?? [])],
        ...(item.mfaEnabledAt !== undefined && { mfaEnabledAt: item.mfaEnabledAt }),
    };
}

// =============================================================================
// Port
// =============================================================================

export interface MfaStore {
    /** Current enrollment; null when the user does not exist */
    getEnrollment(userId: string): Promise<TotpEnrollment | null>;
    /** Enable with a verified secret; false when already enabled or no such user */
    enable(userId: string, secret: string, backupCodeHashes: readonly string[], enabledAt: string): Promise<boolean>;
    /** Clear the enrollment; false when not enabled */
    disable(userId: string, updatedAt: string): Promise<boolean>;
    /** Remove one hash; the number left, or null when the hash was not present */
    consumeBackupCode(userId: string, codeHash: string, updatedAt: string): Promise<number | null>;
    /** Replace every hash; false when not enabled */
    replaceBackupCodes(userId: string, backupCodeHashes: readonly string[], updatedAt: string): Promise<boolean>;
}

// =============================================================================
// DynamoDB Adapter
// =============================================================================

export class DynamoMfaStore implements MfaStore {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string
    ) {}

    private key(userId: string): Record<string, string> {
        return { PK: `${KeyPrefixes.USER}${userId}`, SK: 'PROFILE' };
    }

    async getEnrollment(userId: string): Promise<TotpEnrollment | null> {
        const result = await withRetry(() => this.client.send(
            new GetCommand({
                TableName: this.tableName,
                Key: this.key(userId),
                ConsistentRead: true,
            })
        ));

        if (!result.Item || !isUserItem(result.Item)) {
            return null;
        }

        return toEnrollment(result.Item);
    }

    async enable(
        userId: string,
        secret: string,
        backupCodeHashes: readonly string[],
        enabledAt: string
    ): Promise<boolean> {
        // DynamoDB rejects empty sets
        const setCodes = backupCodeHashes.length > 0 ? ', mfaBackupCodes = :codes' : '';

        try {
            await withRetry(() => this.client.send(
                new UpdateCommand({
                    TableName: this.tableName,
                    Key: this.key(userId),
                    UpdateExpression: `SET mfaEnabled = :enabled, mfaSecret = :secret${setCodes}, `
                        + 'mfaEnabledAt = :now, updatedAt = :now',
                    ConditionExpression: ENABLE_CONDITION,
                    ExpressionAttributeValues: {
                        ':enabled': true,
                        ':disabled': false,
                        ':secret': secret,
                        ':now': enabledAt,
                        ...(backupCodeHashes.length > 0 && { ':codes': new Set(backupCodeHashes) }),
                    },
                })
            ));
            return true;
        } catch (error) {
            if (isConditionalCheckFailed(error)) {
                return false;
            }
            throw error;
        }
    }

    async disable(userId: string, updatedAt: string): Promise<boolean> {
        try {
            await withRetry(() => this.client.send(
                new UpdateCommand({
                    TableName: this.tableName,
                    Key: this.key(userId),
                    UpdateExpression: 'SET mfaEnabled = :disabled, updatedAt = :now '
                        + 'REMOVE mfaSecret, mfaBackupCodes, mfaEnabledAt',
                    ConditionExpression: 'attribute_exists(PK) AND mfaEnabled = :enabled',
                    ExpressionAttributeValues: {
                        ':disabled': false,
                        ':enabled': true,
                        ':now': updatedAt,
                    },
                })
            ));
            return true;
        } catch (error) {
            if (isConditionalCheckFailed(error)) {
                return false;
            }
            throw error;
        }
    }

    async consumeBackupCode(userId: string, codeHash: string, updatedAt: string): Promise<number | null> {
        try {
            const result = await withRetry(() => this.client.send(
                new UpdateCommand({
                    TableName: this.tableName,
                    Key: this.key(userId),
                    UpdateExpression: 'DELETE mfaBackupCodes :code SET updatedAt = :now',
                    ConditionExpression: 'mfaEnabled = :enabled AND contains(mfaBackupCodes, :hash)',
                    ExpressionAttributeValues: {
                        ':code': new Set([codeHash]),
                        ':hash': codeHash,
                        ':enabled': true,
                        ':now': updatedAt,
                    },
                    ReturnValues: 'UPDATED_NEW',
                })
            ));

            // The attribute disappears with its last member
            const remaining: unknown = result.Attributes?.mfaBackupCodes;
            return remaining instanceof Set ? remaining.size : 0;
        } catch (error) {
            if (isConditionalCheckFailed(error)) {
                return null;
            }
            throw error;
        }
    }

    async replaceBackupCodes(
        userId: string,
        backupCodeHashes: readonly string[],
        updatedAt: string
    ): Promise<boolean> {
        const update = backupCodeHashes.length > 0
            ? 'SET mfaBackupCodes = :codes, updatedAt = :now'
            : 'SET updatedAt = :now REMOVE mfaBackupCodes';

        try {
            await withRetry(() => this.client.send(
                new UpdateCommand({
                    TableName: this.tableName,
                    Key: this.key(userId),
                    UpdateExpression: update,
                    ConditionExpression: 'mfaEnabled = :enabled',
                    ExpressionAttributeValues: {
                        ':enabled': true,
                        ':now': updatedAt,
                        ...(backupCodeHashes.length > 0 && { ':codes': new Set(backupCodeHashes) }),
                    },
                })
            ));
            return true;
        } catch (error) {
            if (isConditionalCheckFailed(error)) {
                return false;
            }
            throw error;
        }
    }
}
