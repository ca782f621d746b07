/**
 * AuthGate - Base DynamoDB Schema Types
 *
 * Foundation interfaces for Single Table Design.
 * All entity types extend BaseItem for consistent key structure.
 *
 * Key Design:
 * - PK (Partition Key): Entity-specific prefix pattern (e.g., CLIENT#<id>)
 * - SK (Sort Key): Entity type identifier (CONFIG, PROFILE, METADATA)
 * - GSI1: Secondary access patterns (codes by client, users by username)
 *
 * TTL Strategy:
 * - Short-lived entities (auth codes, pending authorizations): TTL set to expiresAt
 * - Long-lived entities (users, clients): No TTL (managed via admin operations)
 *
 * @see https://docs.aws.amazon.com/amazondynamodb/latest/developerguide/TTL.html
 */

// =============================================================================
// Key Pattern Prefixes
// =============================================================================

/** Partition Key prefixes for each entity type */
export type PKPrefix =
    | `CLIENT#${string}`
    | `USER#${string}`
    | `CODE#${string}`
    | `SESSION#${string}`;

/** Sort Key values */
export type SKValue = 'CONFIG' | 'PROFILE' | 'METADATA';

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType =
    | 'CLIENT'
    | 'USER'
    | 'AUTH_CODE'
    | 'PENDING_AUTHORIZATION';

// =============================================================================
// Grant Types
// =============================================================================

/**
 * Grant types a client may be registered for.
 * Only authorization_code is served by the token endpoint; refresh_token
 * is accepted in client policy and answered with unsupported_grant_type.
 */
export type GrantType =
    | 'authorization_code'
    | 'refresh_token';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items in the Single Table Design.
 */
export interface BaseItem {
    /** Partition Key - Entity-specific prefix pattern */
    PK: string;
    /** Sort Key - Entity type identifier */
    SK: SKValue;
    /** GSI1 Partition Key - For reverse lookups and queries */
    GSI1PK: string;
    /** GSI1 Sort Key - For range queries on GSI1 */
    GSI1SK: string;
    /** TTL for automatic expiration (Unix epoch seconds) */
    ttl?: number;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** ISO 8601 creation timestamp */
    createdAt: string;
    /** ISO 8601 last update timestamp */
    updatedAt: string;
}
