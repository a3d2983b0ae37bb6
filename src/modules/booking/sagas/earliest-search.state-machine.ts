import { EarliestReservation, ReservationOutcome, ServiceFailure } from '../outcomes/reservation-outcome';

export enum EarliestSearchState {
    ATTEMPTING = 'ATTEMPTING',
    SETTLED = 'SETTLED',
    RETRYING = 'RETRYING',
    EXHAUSTED = 'EXHAUSTED',
}

/** What a single attempt produced. */
export type AttemptResult =
    | { kind: 'settled'; outcome: ReservationOutcome<EarliestReservation> }
    | { kind: 'failed'; failure: ServiceFailure | null };

export type EarliestSearchStep =
    | { state: EarliestSearchState.ATTEMPTING; attempt: number }
    | { state: EarliestSearchState.SETTLED; attempt: number; outcome: ReservationOutcome<EarliestReservation> }
    | { state: EarliestSearchState.RETRYING; attempt: number; delayMs: number; lastFailure: ServiceFailure | null }
    | { state: EarliestSearchState.EXHAUSTED; attempts: number; lastFailure: ServiceFailure | null };

export interface EarliestSearchPolicy {
    maxAttempts: number;
    backoffMs: number;
}

/** Delay before the attempt that follows failed attempt `attempt` (1-based). */
export const backoffDelay = (attempt: number, backoffMs: number): number => backoffMs * attempt;

export const startSearch = (): EarliestSearchStep => ({ state: EarliestSearchState.ATTEMPTING, attempt: 1 });

/**
 * Attempting(n) → Settled | Retrying(n+1) | Exhausted
 *
 * A settled attempt ends the search whatever its outcome. A failed one retries after
 * backoff until the attempt budget is spent.
 */
export const nextSearchStep = (
    attempt: number,
    result: AttemptResult,
    policy: EarliestSearchPolicy,
): EarliestSearchStep => {
    if (result.kind === 'settled') {
        return { state: EarliestSearchState.SETTLED, attempt, outcome: result.outcome };
    }
    if (attempt >= policy.maxAttempts) {
        return { state: EarliestSearchState.EXHAUSTED, attempts: attempt, lastFailure: result.failure };
    }
    return {
        state: EarliestSearchState.RETRYING,
        attempt: attempt + 1,
        delayMs: backoffDelay(attempt, policy.backoffMs),
        lastFailure: result.failure,
    };
};
