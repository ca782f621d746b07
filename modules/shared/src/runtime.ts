/**
 * AuthGate - Runtime Wiring
 *
 * Builds the collaborators a Lambda container needs from `ServerConfig`.
 * Handlers are created through factories that take these collaborators,
 * so tests wire in-memory stand-ins instead of DynamoDB and KMS.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { CredentialSettings } from './auth/credential';
import type { Clock } from './clock';
import { systemClock } from './clock';
import { loadServerConfig } from './config';
import type { ServerConfig } from './config';
import { createSigner } from './jwt';
import type { JwtSigner } from './jwt';
import type { HttpResponse } from './response';
import { DynamoAuthorizationCodeStore } from './storage/auth-code-store';
import type { AuthorizationCodeStore } from './storage/auth-code-store';
import { DynamoAuthorizationRequestStore } from './storage/authorization-request-store';
import type { AuthorizationRequestStore } from './storage/authorization-request-store';
import { DynamoClientRegistry, StaticClientRegistry } from './storage/client-registry';
import type { ClientRegistry, ManagedClientRegistry } from './storage/client-registry';
import { createDocumentClient } from './storage/dynamo-client';
import { DynamoUserDirectory } from './storage/user-directory';
import type { UserDirectory } from './storage/user-directory';

export type LambdaHandler = (event: APIGatewayProxyEventV2, context?: Context) => Promise<HttpResponse>;

export interface Runtime {
    readonly config: ServerConfig;
    readonly clock: Clock;
    readonly docClient: DynamoDBDocumentClient;
    readonly signer: JwtSigner;
    /** Static clients first, then DynamoDB */
    readonly clients: ClientRegistry;
    readonly managedClients: ManagedClientRegistry;
    readonly codes: AuthorizationCodeStore;
    readonly pendingRequests: AuthorizationRequestStore;
    readonly users: UserDirectory;
    readonly credentials: CredentialSettings;
}

export function createRuntime(config: ServerConfig = loadServerConfig(), clock: Clock = systemClock): Runtime {
    const docClient = createDocumentClient({ region: config.region });
    const signer = createSigner(config.signing, config.region);
    const managedClients = new DynamoClientRegistry(docClient, config.tableName);
    const clients = config.clientsFile
        ? StaticClientRegistry.fromFile(config.clientsFile, managedClients)
        : managedClients;

    return {
        config,
        clock,
        docClient,
        signer,
        clients,
        managedClients,
        codes: new DynamoAuthorizationCodeStore(docClient, config.tableName, clock, config.lifetimes.authorizationCode),
        pendingRequests: new DynamoAuthorizationRequestStore(
            docClient, config.tableName, clock, config.lifetimes.authorizationCode),
        users: new DynamoUserDirectory(docClient, config.tableName),
        credentials: {
            issuer: config.issuer,
            signer,
            clock,
            sessionTtl: config.lifetimes.session,
            mfaPendingTtl: config.lifetimes.mfaPending,
        },
    };
}

/**
 * Defer configuration loading to the first invocation, then reuse the
 * built handler for the life of the container.
 *
 * @example
 * ```typescript
 * export const handler = lazyHandler((runtime) => createTokenHandler({ ... }));
 * ```
 */
export function lazyHandler(build: (runtime: Runtime) => LambdaHandler): LambdaHandler {
    let built: LambdaHandler | null = null;
    return (event, context) => {
        if (!built) {
            built = build(createRuntime());
        }
        return built(event, context);
    };
}
