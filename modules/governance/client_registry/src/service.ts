/**
 * AuthGate - Client Administration Service
 *
 * Registration, policy updates and deletion of dynamic clients. Static
 * clients from CLIENTS_FILE are read-only and not reachable here.
 *
 * Security:
 * - client_secret has 32 bytes of entropy and is returned once
 * - only its SHA-256 hash is stored
 * - deletion disables the client first, so no new code is issued while
 *   outstanding codes are revoked
 *
 * @module client_registry/service
 */

import { randomUUID } from 'node:crypto';
import { fail, generateSecureRandom, hashToken, ok } from '@authgate/shared';
import type {
    AuditLogger,
    AuthorizationCodeStore,
    ManagedClientRegistry,
    Result,
} from '@authgate/shared';
import type { AuditActor, AuditResource } from '../../../shared_types/audit';
import type { OAuthClient } from '../../../shared_types/client';
import type { ClientMetadataError } from './types';
import { validatePolicyUpdate, validateRegistration } from './validation';

/** Secret entropy in bytes */
const CLIENT_SECRET_BYTES = 32;

export type ClientAdminError =
    | { readonly kind: 'NOT_FOUND' }
    | { readonly kind: 'CONFLICT' }
    | { readonly kind: 'INVALID_METADATA'; readonly error: ClientMetadataError };

export interface RegisteredClient {
    client: OAuthClient;
    /** Plaintext secret for confidential clients; never stored */
    clientSecret?: string;
}

function clientResource(clientId: string): AuditResource {
    return { type: 'OAUTH2_CLIENT', id: clientId };
}

export class ClientAdminService {
    constructor(
        private readonly registry: ManagedClientRegistry,
        private readonly codes: AuthorizationCodeStore
    ) {}

    async register(
        body: Record<string, unknown>,
        actor: AuditActor,
        audit: AuditLogger
    ): Promise<Result<RegisteredClient, ClientAdminError>> {
        const draft = validateRegistration(body);
        if (!draft.ok) {
            return fail<ClientAdminError>({ kind: 'INVALID_METADATA', error: draft.error });
        }

        const clientId = randomUUID();
        const clientSecret = draft.value.confidential ? generateSecureRandom(CLIENT_SECRET_BYTES) : undefined;
        const client: OAuthClient = {
            ...draft.value,
            clientId,
            ...(clientSecret !== undefined && { secretHash: hashToken(clientSecret) }),
        };

        if (!await this.registry.register(client)) {
            return fail<ClientAdminError>({ kind: 'CONFLICT' });
        }

        audit.success('CLIENT_CREATED', actor, {
            clientName: client.clientName,
            confidential: client.confidential,
            grantTypes: client.allowedGrantTypes,
            redirectUris: client.redirectUris,
        }, clientResource(clientId));

        return ok<RegisteredClient>({ client, ...(clientSecret !== undefined && { clientSecret }) });
    }

    async get(clientId: string): Promise<Result<OAuthClient, ClientAdminError>> {
        const client = await this.registry.findClient(clientId);
        return client ? ok(client) : fail<ClientAdminError>({ kind: 'NOT_FOUND' });
    }

    async update(
        clientId: string,
        body: Record<string, unknown>,
        actor: AuditActor,
        audit: AuditLogger
    ): Promise<Result<OAuthClient, ClientAdminError>> {
        const existing = await this.registry.findClient(clientId);
        if (!existing) {
            return fail<ClientAdminError>({ kind: 'NOT_FOUND' });
        }

        const update = validatePolicyUpdate(body, existing);
        if (!update.ok) {
            return fail<ClientAdminError>({ kind: 'INVALID_METADATA', error: update.error });
        }

        const updated = await this.registry.updatePolicy(clientId, update.value);
        if (!updated) {
            return fail<ClientAdminError>({ kind: 'NOT_FOUND' });
        }

        audit.success('CLIENT_UPDATED', actor, { fields: Object.keys(update.value) }, clientResource(clientId));
        return ok(updated);
    }

    /**
     * Disable, revoke outstanding codes, then delete.
     */
    async remove(
        clientId: string,
        actor: AuditActor,
        audit: AuditLogger
    ): Promise<Result<{ revokedCodes: number }, ClientAdminError>> {
        const disabled = await this.registry.updatePolicy(clientId, { enabled: false });
        if (!disabled) {
            return fail<ClientAdminError>({ kind: 'NOT_FOUND' });
        }

        const revokedCodes = await this.codes.revokeByClient(clientId);
        audit.success('AUTH_CODES_REVOKED', actor, { count: revokedCodes }, clientResource(clientId));

        if (!await this.registry.remove(clientId)) {
            return fail<ClientAdminError>({ kind: 'NOT_FOUND' });
        }

        audit.success('CLIENT_DELETED', actor, { clientName: disabled.clientName }, clientResource(clientId));
        return ok({ revokedCodes });
    }
}
