/**
 * AuthGate - Type Guards
 *
 * Runtime guards for DynamoDB entity discrimination in the single table.
 * Each guard checks the entityType discriminator, the PK prefix and the SK.
 *
 * Usage:
 * ```typescript
 * const result = await docClient.send(new GetCommand({ ... }));
 * if (result.Item && isClientItem(result.Item)) {
 *   // result.Item is ClientItem here
 * }
 * ```
 */

import type { BaseItem } from '../../shared_types/base';
import type { ClientItem } from '../../shared_types/client';
import type { UserItem } from '../../shared_types/user';
import type { AuthCodeItem } from '../../shared_types/token';
import type { PendingAuthorizationItem } from '../../shared_types/session';
import { KeyPrefixes } from './constants';

/** Key Pattern: PK=CLIENT#<client_id>, SK=CONFIG */
export function isClientItem(item: BaseItem): item is ClientItem {
    return (
        item.entityType === 'CLIENT' &&
        item.PK.startsWith(KeyPrefixes.CLIENT) &&
        item.SK === 'CONFIG'
    );
}

/** Key Pattern: PK=USER#<user_id>, SK=PROFILE */
export function isUserItem(item: BaseItem): item is UserItem {
    return (
        item.entityType === 'USER' &&
        item.PK.startsWith(KeyPrefixes.USER) &&
        item.SK === 'PROFILE'
    );
}

/** Key Pattern: PK=CODE#<sha256(code)>, SK=METADATA */
export function isAuthCodeItem(item: BaseItem): item is AuthCodeItem {
    return (
        item.entityType === 'AUTH_CODE' &&
        item.PK.startsWith(KeyPrefixes.CODE) &&
        item.SK === 'METADATA'
    );
}

/** Key Pattern: PK=SESSION#<request_id>, SK=METADATA */
export function isPendingAuthorizationItem(item: BaseItem): item is PendingAuthorizationItem {
    return (
        item.entityType === 'PENDING_AUTHORIZATION' &&
        item.PK.startsWith(KeyPrefixes.SESSION) &&
        item.SK === 'METADATA'
    );
}
