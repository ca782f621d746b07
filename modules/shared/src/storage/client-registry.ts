/**
 * AuthGate - Client Registry
 *
 * Lookup of registered OAuth clients and their policy. A static registry
 * (loaded from a JSON file at cold start) answers first and falls back to
 * the DynamoDB registry, which also supports administrative changes.
 *
 * @module storage/client-registry
 */

import { readFileSync } from 'node:fs';
import {
    DeleteCommand,
    GetCommand,
    PutCommand,
    UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { GrantType } from '../../../shared_types/base';
import type { ClientItem, ClientPolicyUpdate, OAuthClient } from '../../../shared_types/client';
import { KeyPrefixes } from '../constants';
import { isClientItem } from '../type-guards';
import { isConditionalCheckFailed, withRetry } from './retry';

// =============================================================================
// Ports
// =============================================================================

export interface ClientRegistry {
    findClient(clientId: string): Promise<OAuthClient | null>;
}

export interface ManagedClientRegistry extends ClientRegistry {
    /** Insert a new client; false when the id is taken */
    register(client: OAuthClient): Promise<boolean>;
    /** Apply a policy update; null when the client does not exist */
    updatePolicy(clientId: string, update: ClientPolicyUpdate): Promise<OAuthClient | null>;
    /** Delete a client; false when it did not exist */
    remove(clientId: string): Promise<boolean>;
}

// =============================================================================
// Mapping
// =============================================================================

function clientKey(clientId: string): { PK: `CLIENT#${string}`; SK: 'CONFIG' } {
    return { PK: `${KeyPrefixes.CLIENT}${clientId}`, SK: 'CONFIG' };
}

function fromItem(item: ClientItem): OAuthClient {
    return {
        clientId: item.clientId,
        clientName: item.clientName,
        confidential: item.confidential,
        ...(item.secretHash !== undefined && { secretHash: item.secretHash }),
        redirectUris: [...item.redirectUris],
        allowedScopes: [...item.allowedScopes],
        allowedGrantTypes: [...item.allowedGrantTypes],
        requirePkce: item.requirePkce,
        accessTokenTTL: item.accessTokenTTL,
        refreshTokenTTL: item.refreshTokenTTL,
        enabled: item.enabled,
    };
}

// =============================================================================
// DynamoDB Registry
// =============================================================================

/**
 * Fields `updatePolicy` may write, in a fixed order so the generated
 * expression is stable.
 */
const POLICY_FIELDS = [
    'clientName',
    'redirectUris',
    'allowedScopes',
    'allowedGrantTypes',
    'requirePkce',
    'accessTokenTTL',
    'refreshTokenTTL',
    'enabled',
] as const satisfies readonly (keyof ClientPolicyUpdate)[];

export class DynamoClientRegistry implements ManagedClientRegistry {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string
    ) {}

    async findClient(clientId: string): Promise<OAuthClient | null> {
        const result = await withRetry(() => this.client.send(
            new GetCommand({
                TableName: this.tableName,
                Key: clientKey(clientId),
            })
        ));

        if (!result.Item || !isClientItem(result.Item)) {
            return null;
        }
        return fromItem(result.Item);
    }

    async register(oauthClient: OAuthClient): Promise<boolean> {
        const now = new Date().toISOString();
        const item: ClientItem = {
            ...oauthClient,
            ...clientKey(oauthClient.clientId),
            GSI1PK: 'CLIENTS',
            GSI1SK: oauthClient.clientId,
            entityType: 'CLIENT',
            createdAt: now,
            updatedAt: now,
        };

        try {
            await withRetry(() => this.client.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: item,
                    ConditionExpression: 'attribute_not_exists(PK)',
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

    /**
     * One conditional UpdateItem that touches only the named policy
     * fields; identity and secret are never written here.
     */
    async updatePolicy(clientId: string, update: ClientPolicyUpdate): Promise<OAuthClient | null> {
        const names: Record<string, string> = {};
        const values: Record<string, unknown> = { ':updatedAt': new Date().toISOString() };
        const assignments = ['updatedAt = :updatedAt'];

        for (const field of POLICY_FIELDS) {
            const value = update[field];
            if (value !== undefined) {
                names[`#${field}`] = field;
                values[`:${field}`] = value;
                assignments.push(`#${field} = :${field}`);
            }
        }

        try {
            const result = await withRetry(() => this.client.send(
                new UpdateCommand({
                    TableName: this.tableName,
                    Key: clientKey(clientId),
                    UpdateExpression: `SET ${assignments.join(', ')}`,
                    ConditionExpression: 'attribute_exists(PK)',
                    ...(Object.keys(names).length > 0 && { ExpressionAttributeNames: names }),
                    ExpressionAttributeValues: values,
                    ReturnValues: 'ALL_NEW',
                })
            ));

            const updated = result.Attributes;
            return updated && isClientItem(updated) ? fromItem(updated) : null;
        } catch (error) {
            if (isConditionalCheckFailed(error)) {
                return null;
            }
            throw error;
        }
    }

    async remove(clientId: string): Promise<boolean> {
        try {
            await withRetry(() => this.client.send(
                new DeleteCommand({
                    TableName: this.tableName,
                    Key: clientKey(clientId),
                    ConditionExpression: 'attribute_exists(PK)',
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

// =============================================================================
// Static Registry
// =============================================================================

const GRANT_TYPES: readonly GrantType[] = ['authorization_code', 'refresh_token'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isGrantType(value: string): value is GrantType {
    return GRANT_TYPES.some((grant) => grant === value);
}

/**
 * Parse one entry of a static client file. Throws on malformed entries so
 * a bad deployment fails at cold start rather than on first use.
 */
export function parseStaticClient(entry: unknown, index: number): OAuthClient {
    const fail = (reason: string): never => {
        throw new Error(`Invalid static client at index ${index}: ${reason}`);
    };

    if (!isRecord(entry)) {
        return fail('not an object');
    }
    const { clientId, clientName, secretHash, redirectUris, allowedScopes, allowedGrantTypes } = entry;

    if (typeof clientId !== 'string' || clientId.length === 0) {
        return fail('clientId is required');
    }
    if (secretHash !== undefined && typeof secretHash !== 'string') {
        return fail('secretHash must be a string');
    }
    if (!isStringArray(redirectUris) || redirectUris.length === 0) {
        return fail('redirectUris must be a non-empty string array');
    }
    if (!isStringArray(allowedScopes)) {
        return fail('allowedScopes must be a string array');
    }
    const grants = isStringArray(allowedGrantTypes) ? allowedGrantTypes : ['authorization_code'];
    const validGrants = grants.filter(isGrantType);
    if (validGrants.length !== grants.length) {
        return fail('allowedGrantTypes contains an unsupported grant type');
    }

    const confidential = typeof secretHash === 'string';
    const requirePkce = entry.requirePkce === undefined ? true : entry.requirePkce === true;
    if (!confidential && !requirePkce) {
        return fail('public clients must require PKCE');
    }

    return {
        clientId,
        clientName: typeof clientName === 'string' ? clientName : clientId,
        confidential,
        ...(typeof secretHash === 'string' && { secretHash }),
        redirectUris,
        allowedScopes,
        allowedGrantTypes: validGrants,
        requirePkce,
        accessTokenTTL: typeof entry.accessTokenTTL === 'number' ? entry.accessTokenTTL : 3600,
        refreshTokenTTL: typeof entry.refreshTokenTTL === 'number' ? entry.refreshTokenTTL : 86400,
        enabled: entry.enabled !== false,
    };
}

export class StaticClientRegistry implements ClientRegistry {
    private readonly clients: ReadonlyMap<string, OAuthClient>;

    constructor(clients: readonly OAuthClient[], private readonly fallback?: ClientRegistry) {
        this.clients = new Map(clients.map((client) => [client.clientId, client]));
    }

    /**
     * Load `{ "clients": [...] }` from disk.
     */
    static fromFile(path: string, fallback?: ClientRegistry): StaticClientRegistry {
        const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
        if (!isRecord(parsed) || !Array.isArray(parsed.clients)) {
            throw new Error(`Static client file ${path} must contain a "clients" array`);
        }
        return new StaticClientRegistry(parsed.clients.map(parseStaticClient), fallback);
    }

    async findClient(clientId: string): Promise<OAuthClient | null> {
        const client = this.clients.get(clientId);
        if (client) {
            return client;
        }
        return this.fallback ? this.fallback.findClient(clientId) : null;
    }
}
