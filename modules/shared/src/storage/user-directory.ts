/**
 * AuthGate - User Directory
 *
 * Read-only lookup of users by id or username. Profile management lives
 * outside this server; login, token and userinfo flows only read.
 *
 * @module storage/user-directory
 */

import { GetCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { UserItem, UserRecord } from '../../../shared_types/user';
import { KeyPrefixes } from '../constants';
import { isUserItem } from '../type-guards';
import { withRetry } from './retry';

export interface UserDirectory {
    findById(userId: string): Promise<UserRecord | null>;
    /** Case-insensitive lookup */
    findByUsername(username: string): Promise<UserRecord | null>;
}

export function toUserRecord(item: UserItem): UserRecord {
    return {
        userId: item.userId,
        username: item.username,
        ...(item.email !== undefined && { email: item.email }),
        emailVerified: item.emailVerified,
        status: item.status,
        roles: [...item.roles],
        ...(item.passwordHash !== undefined && { passwordHash: item.passwordHash }),
        mfaEnabled: item.mfaEnabled === true,
        updatedAt: item.updatedAt,
    };
}

export class DynamoUserDirectory implements UserDirectory {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string
    ) {}

    async findById(userId: string): Promise<UserRecord | null> {
        const result = await withRetry(() => this.client.send(
            new GetCommand({
                TableName: this.tableName,
                Key: { PK: `${KeyPrefixes.USER}${userId}`, SK: 'PROFILE' },
            })
        ));

        if (!result.Item || !isUserItem(result.Item)) {
            return null;
        }
        return toUserRecord(result.Item);
    }

    async findByUsername(username: string): Promise<UserRecord | null> {
        const result = await withRetry(() => this.client.send(
            new QueryCommand({
                TableName: this.tableName,
                IndexName: 'GSI1',
                KeyConditionExpression: 'GSI1PK = :pk AND GSI1SK = :sk',
                ExpressionAttributeValues: {
                    ':pk': `${KeyPrefixes.USERNAME}${username.toLowerCase()}`,
                    ':sk': 'USER',
                },
                Limit: 1,
            })
        ));

        const item = result.Items?.[0];
        if (!item || !isUserItem(item)) {
            return null;
        }
        return toUserRecord(item);
    }
}
