import { ReservationErrorKind } from '../errors/reservation.errors';
import { ReservationSide, ServiceOperation, SlotId } from '../sagas/reservation-side.enum';

export enum OutcomeKind {
    SUCCESS = 'success',
    NO_CANDIDATES = 'no_candidates',
    SERVICE_FAILURE = 'service_failure',
    INCONSISTENT_STATE = 'inconsistent_state',
    EXHAUSTED = 'exhausted',
}

/** One failed call against one service, with enough context to diagnose it. */
export interface ServiceFailure {
    side: ReservationSide;
    operation: ServiceOperation;
    slotId?: SlotId;
    errorKind: ReservationErrorKind;
    message: string;
}

/** A compensation that did not go through: one side is left holding (or missing) a slot. */
export interface InconsistentStateDetail {
    slotId: SlotId;
    /** Side the compensation targeted */
    side: ReservationSide;
    compensation: ServiceOperation.RELEASE | ServiceOperation.RESERVE;
    /** The failure that triggered the compensation */
    cause: ServiceFailure;
    compensationFailure: ServiceFailure;
    message: string;
}

export type ReservationOutcome<T> =
    | { kind: OutcomeKind.SUCCESS; payload: T }
    | { kind: OutcomeKind.NO_CANDIDATES }
    | { kind: OutcomeKind.SERVICE_FAILURE; failure: ServiceFailure }
    | { kind: OutcomeKind.INCONSISTENT_STATE; detail: InconsistentStateDetail }
    | { kind: OutcomeKind.EXHAUSTED; attempts: number; lastFailure: ServiceFailure | null };

export type SuccessOutcome<T> = Extract<ReservationOutcome<T>, { kind: OutcomeKind.SUCCESS }>;

export const succeeded = <T>(payload: T): ReservationOutcome<T> => ({ kind: OutcomeKind.SUCCESS, payload });

export const failedWith = <T>(failure: ServiceFailure): ReservationOutcome<T> => ({
    kind: OutcomeKind.SERVICE_FAILURE,
    failure,
});

export const inconsistent = <T>(detail: InconsistentStateDetail): ReservationOutcome<T> => ({
    kind: OutcomeKind.INCONSISTENT_STATE,
    detail,
});

export const isSuccess = <T>(outcome: ReservationOutcome<T>): outcome is SuccessOutcome<T> =>
    outcome.kind === OutcomeKind.SUCCESS;

export const describeFailure = (failure: ServiceFailure): string => {
    const slot = failure.slotId === undefined ? '' : ` slot ${failure.slotId}`;
    return `${failure.side} ${failure.operation}${slot} failed (${failure.errorKind}): ${failure.message}`;
};

/** Result of one side within a dual reserve or cancel. */
export type SideResult<R> =
    | { status: 'succeeded'; receipt: R }
    | { status: 'already_satisfied' }
    | { status: 'failed'; failure: ServiceFailure }
    | { status: 'compensated'; receipt: R }
    | { status: 'not_attempted' }
    | { status: 'not_requested' };

export interface DualOperationResult<R> {
    slotId: SlotId;
    hotel: SideResult<R>;
    band: SideResult<R>;
    outcome: ReservationOutcome<SlotId>;
}

export interface HeldSlots {
    hotel: SlotId[];
    band: SlotId[];
}

export interface AvailableSlots {
    hotel: SlotId[];
    band: SlotId[];
}

export interface CleanupReport {
    released: HeldSlots;
    /** Later matched pairs cancelled to keep only the earliest */
    cancelledPairs: SlotId[];
    keptPair: SlotId | null;
    failures: ServiceFailure[];
    inconsistencies: InconsistentStateDetail[];
}

export interface EarliestReservation {
    slotId: SlotId;
    /** True when the pair was already held and nothing was reserved */
    alreadyHeld: boolean;
    attempts: number;
    cleanup: CleanupReport | null;
}
