/**
 * AuthGate - Expired Authorization Code Sweeper
 *
 * Scheduled (EventBridge) Lambda that deletes authorization codes past
 * their expiry. DynamoDB TTL also removes them eventually, but TTL
 * deletion can lag by hours; redemption already rejects expired codes, so
 * the sweep only keeps the table small.
 *
 * @module oauth2_token/sweeper
 */

import type { ScheduledEvent } from 'aws-lambda';
import { createRuntime, createSystemLogger, describeError } from '@authgate/shared';
import type { AuthorizationCodeStore, Clock } from '@authgate/shared';
import type { AuditSink } from '../../../shared_types/audit';

const PROCESS_NAME = 'auth-code-sweeper';

export interface SweeperDeps {
    readonly codes: AuthorizationCodeStore;
    readonly clock: Clock;
    readonly auditSink?: AuditSink;
}

export interface SweepResult {
    deleted: number;
    sweptAt: number;
}

export type SweepHandler = (event?: ScheduledEvent) => Promise<SweepResult>;

export function createSweepHandler(deps: SweeperDeps): SweepHandler {
    return async () => {
        const audit = createSystemLogger(PROCESS_NAME, deps.auditSink);
        const now = deps.clock();

        try {
            const deleted = await deps.codes.sweepExpired(now);
            audit.success('AUTH_CODES_SWEPT', { type: 'SYSTEM', process: PROCESS_NAME }, { deleted, now });
            return { deleted, sweptAt: now };
        } catch (err) {
            audit.failure('AUTH_CODES_SWEPT', { type: 'SYSTEM', process: PROCESS_NAME }, {
                now,
                error: describeError(err),
            });
            throw err;
        }
    };
}

let built: SweepHandler | null = null;

export const sweepHandler: SweepHandler = (event) => {
    if (!built) {
        const runtime = createRuntime();
        built = createSweepHandler({ codes: runtime.codes, clock: runtime.clock });
    }
    return built(event);
};
