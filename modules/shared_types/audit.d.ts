/**
 * AuthGate - Audit Schema
 *
 * Structured audit entries written as one JSON line each, for CloudWatch.
 * Failure actions are named apart from their success counterparts so
 * alarms can match on action name alone.
 */

// =============================================================================
// Audit Actions
// =============================================================================

export type AuditAction =
    // Authorization endpoint
    | 'AUTH_CODE_ISSUED'
    | 'AUTH_CODE_REJECTED'
    | 'AUTH_REQUEST_SUSPENDED'
    // Token endpoint
    | 'AUTH_CODE_EXCHANGED'
    | 'TOKEN_ISSUED'
    | 'TOKEN_GRANT_FAILED'
    | 'PKCE_FAILED'
    | 'CLIENT_AUTHENTICATED'
    | 'CLIENT_AUTH_FAILED'
    // Code lifecycle
    | 'AUTH_CODES_REVOKED'
    | 'AUTH_CODES_SWEPT'
    // Login
    | 'LOGIN_SUCCESS'
    | 'LOGIN_FAILURE'
    // Client registry
    | 'CLIENT_CREATED'
    | 'CLIENT_UPDATED'
    | 'CLIENT_DELETED'
    // MFA
    | 'MFA_SETUP_INITIATED'
    | 'MFA_SETUP_FAILED'
    | 'MFA_ENABLED'
    | 'MFA_VERIFY_SUCCESS'
    | 'MFA_VERIFY_FAILED'
    | 'MFA_BACKUP_CODE_USED'
    | 'MFA_BACKUP_CODE_FAILED'
    | 'MFA_DISABLED'
    | 'MFA_DISABLE_FAILED'
    | 'MFA_BACKUP_CODES_REGENERATED'
    | 'MFA_BACKUP_REGEN_FAILED';

export type AuditOutcome = 'SUCCESS' | 'FAILURE';

// =============================================================================
// Actor Types
// =============================================================================

export type AuditActor =
    | { type: 'USER'; sub: string; username?: string }
    | { type: 'CLIENT'; clientId: string }
    | { type: 'SYSTEM'; process?: string }
    | { type: 'ANONYMOUS' };

/** The entity an action touched */
export interface AuditResource {
    type: 'OAUTH2_CLIENT' | 'AUTH_CODE' | 'USER' | 'MFA_ENROLLMENT';
    id: string;
}

// =============================================================================
// Audit Log Entry
// =============================================================================

/**
 * @example
 * ```typescript
 * const entry: AuditLogEntry = {
 *   level: 'AUDIT',
 *   timestamp: '2026-01-15T10:30:00.000Z',
 *   requestId: 'req-1',
 *   ip: '192.0.2.10',
 *   action: 'MFA_VERIFY_FAILED',
 *   outcome: 'FAILURE',
 *   actor: { type: 'USER', sub: 'user-1', username: 'alice' },
 *   resource: { type: 'MFA_ENROLLMENT', id: 'user-1' },
 *   details: { reason: 'invalid_code' }
 * };
 * ```
 */
export interface AuditLogEntry {
    level: 'AUDIT';
    /** ISO 8601 UTC timestamp */
    timestamp: string;
    requestId: string;
    ip: string;
    action: AuditAction;
    outcome: AuditOutcome;
    actor: AuditActor;
    resource?: AuditResource;
    details: Record<string, unknown>;
}

/** Destination for audit entries */
export type AuditSink = (entry: AuditLogEntry) => void;
