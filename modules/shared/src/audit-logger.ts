/**
 * AuthGate - Audit Logger
 *
 * Structured JSON logging to CloudWatch.
 *
 * - Every state-changing operation produces an audit entry with an outcome
 * - Failure actions have their own names (MFA_VERIFY_FAILED, PKCE_FAILED, ...)
 * - Request context (requestId, IP) is captured for traceability
 *
 * Entries go to an `AuditSink`; the default writes one JSON line to the
 * console, which Lambda routes to CloudWatch.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AuditAction,
    AuditActor,
    AuditLogEntry,
    AuditOutcome,
    AuditResource,
    AuditSink,
} from '../../shared_types/audit';

// =============================================================================
// Request Context Interface
// =============================================================================

export interface AuditContext {
    /** AWS Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
    /** User agent string */
    userAgent?: string;
}

export const consoleAuditSink: AuditSink = (entry) => {
    console.log(JSON.stringify(entry));
};

// =============================================================================
// Audit Logger Implementation
// =============================================================================

export class AuditLogger {
    private readonly context: AuditContext;
    private readonly sink: AuditSink;

    constructor(context: AuditContext, sink: AuditSink = consoleAuditSink) {
        this.context = context;
        this.sink = sink;
    }

    /**
     * Record an audit event.
     */
    record(
        action: AuditAction,
        outcome: AuditOutcome,
        actor: AuditActor,
        details: Record<string, unknown> = {},
        resource?: AuditResource
    ): void {
        const entry: AuditLogEntry = {
            level: 'AUDIT',
            timestamp: new Date().toISOString(),
            requestId: this.context.requestId,
            ip: this.context.ip,
            action,
            outcome,
            actor,
            ...(resource && { resource }),
            details,
        };

        this.sink(entry);
    }

    success(action: AuditAction, actor: AuditActor, details?: Record<string, unknown>, resource?: AuditResource): void {
        this.record(action, 'SUCCESS', actor, details, resource);
    }

    failure(action: AuditAction, actor: AuditActor, details?: Record<string, unknown>, resource?: AuditResource): void {
        this.record(action, 'FAILURE', actor, details, resource);
    }

    // ---------------------------------------------------------------------------
    // Convenience Methods
    // ---------------------------------------------------------------------------

    loginSuccess(
        actor: AuditActor,
        details: { method: 'password'; mfaPending: boolean }
    ): void {
        this.success('LOGIN_SUCCESS', actor, details);
    }

    loginFailure(details: { method: 'password'; username?: string; reason: string }): void {
        this.failure('LOGIN_FAILURE', { type: 'ANONYMOUS' }, details);
    }

    authCodeIssued(
        actor: AuditActor,
        details: { clientId: string; scopes: string[]; expiresAt: number; pkceMethod?: string }
    ): void {
        this.success('AUTH_CODE_ISSUED', actor, details, { type: 'OAUTH2_CLIENT', id: details.clientId });
    }

    authCodeRejected(details: { clientId?: string; error: string; reason: string }): void {
        this.failure('AUTH_CODE_REJECTED', { type: 'ANONYMOUS' }, details,
            details.clientId ? { type: 'OAUTH2_CLIENT', id: details.clientId } : undefined);
    }

    authCodeExchanged(actor: AuditActor, details: { clientId: string; grantType: 'authorization_code' }): void {
        this.success('AUTH_CODE_EXCHANGED', actor, details, { type: 'OAUTH2_CLIENT', id: details.clientId });
    }

    tokenIssued(
        actor: AuditActor,
        details: { clientId: string; scopes: string[]; expiresAt: number; idToken: boolean }
    ): void {
        this.success('TOKEN_ISSUED', actor, details, { type: 'OAUTH2_CLIENT', id: details.clientId });
    }

    tokenGrantFailed(details: { clientId?: string; error: string; reason: string }): void {
        this.failure('TOKEN_GRANT_FAILED',
            details.clientId ? { type: 'CLIENT', clientId: details.clientId } : { type: 'ANONYMOUS' },
            details);
    }

    pkceFailed(details: { clientId: string; userId: string; method: string; reason: string }): void {
        this.failure('PKCE_FAILED', { type: 'CLIENT', clientId: details.clientId }, details,
            { type: 'OAUTH2_CLIENT', id: details.clientId });
    }

    clientAuthenticated(details: {
        clientId: string;
        method: 'client_secret_basic' | 'client_secret_post' | 'none';
    }): void {
        this.success('CLIENT_AUTHENTICATED', { type: 'CLIENT', clientId: details.clientId }, details);
    }

    clientAuthFailed(details: {
        clientId?: string;
        reason: 'unknown_client' | 'disabled_client' | 'missing_secret' | 'invalid_secret';
    }): void {
        this.failure('CLIENT_AUTH_FAILED', { type: 'ANONYMOUS' }, details);
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

function sourceIp(event: APIGatewayProxyEventV2): string {
    // HTTP API v2 headers are lowercase
    const forwardedFor = event.headers?.['x-forwarded-for'];
    return forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';
}

function requestIdOf(event: APIGatewayProxyEventV2, lambdaContext?: Context): string {
    return lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';
}

/**
 * Build an AuditLogger bound to an HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const audit = withContext(event, context);
 *   audit.success('MFA_ENABLED', { type: 'USER', sub: 'user-123' });
 * };
 * ```
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context,
    sink?: AuditSink
): AuditLogger {
    return new AuditLogger({
        requestId: requestIdOf(event, lambdaContext),
        ip: sourceIp(event),
        userAgent: event.headers?.['user-agent'],
    }, sink);
}

/**
 * Create an AuditLogger for scheduled or background processes.
 */
export function createSystemLogger(processName: string, sink?: AuditSink): AuditLogger {
    return new AuditLogger({
        requestId: `system-${Date.now()}`,
        ip: 'internal',
        userAgent: processName,
    }, sink);
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * General-purpose structured logger for non-audit events.
 */
export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): Logger {
    return new Logger(requestIdOf(event, lambdaContext));
}
