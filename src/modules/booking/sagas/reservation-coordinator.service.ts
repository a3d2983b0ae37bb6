import { Inject, Injectable, Logger } from '@nestjs/common';
import { BOOKING_SETTINGS, CAPACITY_PRESSURE_THRESHOLD, SEARCH_CANDIDATE_LIMIT } from '../booking.constants';
import { BookingSettings, ReservationBackend } from '../config/booking.config';
import { candidateSet, earliest, matchedPairs, sortSlots } from '../matching/slot-matcher';
import {
    AvailableSlots,
    CleanupReport,
    EarliestReservation,
    HeldSlots,
    OutcomeKind,
    ReservationOutcome,
    SideResult,
    describeFailure,
    failedWith,
    inconsistent,
    isSuccess,
    succeeded,
} from '../outcomes/reservation-outcome';
import { CallResult, ReservationGateway } from '../services/reservation-gateway.service';
import { ReservationReceipt } from '../services/reservation-service.interface';
import { CleanupEngine } from './cleanup-engine.service';
import { DualReservationSaga, DualResult } from './dual-reservation.saga';
import {
    AttemptResult,
    EarliestSearchState,
    EarliestSearchStep,
    nextSearchStep,
    startSearch,
} from './earliest-search.state-machine';
import { ReservationSide, SIDE_ORDER, SlotId } from './reservation-side.enum';

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const requestedSides = (side?: ReservationSide): ReservationSide[] => (side ? [side] : [...SIDE_ORDER]);

const withoutSlot = (ids: SlotId[], slotId: SlotId): SlotId[] => ids.filter(id => id !== slotId);

/**
 * Reservation Coordinator
 *
 * Operation surface over the hotel and band services. Every operation reads fresh state
 * from the services, issues calls one at a time through the rate-limited gateway and
 * returns a tagged outcome instead of throwing.
 *
 * reserveEarliest() is the top-level saga:
 *   snapshot → cleanup under capacity pressure → candidates → keep/cancel current pair
 *   → reserve missing sides → cleanup, retried as a bounded state machine.
 */
@Injectable()
export class ReservationCoordinator {
    private readonly logger = new Logger(ReservationCoordinator.name);

    constructor(
        private readonly gateway: ReservationGateway,
        private readonly dualReservation: DualReservationSaga,
        private readonly cleanupEngine: CleanupEngine,
        @Inject(BOOKING_SETTINGS) private readonly settings: BookingSettings,
    ) {}

    /** Backend each side is running on, after any fallback at startup. */
    activeBackends(): Record<ReservationSide, ReservationBackend> {
        return {
            [ReservationSide.HOTEL]: this.gateway.service(ReservationSide.HOTEL).backend,
            [ReservationSide.BAND]: this.gateway.service(ReservationSide.BAND).backend,
        };
    }

    async listHeld(): Promise<ReservationOutcome<HeldSlots>> {
        const held = await this.gateway.snapshotHeld();
        if (!held.ok) {
            this.logger.warn(`Error retrieving held slots: ${describeFailure(held.failure)}`);
            return failedWith(held.failure);
        }
        return succeeded({ hotel: sortSlots(held.value.hotel), band: sortSlots(held.value.band) });
    }

    /** Earliest slots that could become a matched pair. */
    async candidateSlots(limit: number = this.settings.candidateLimit): Promise<ReservationOutcome<SlotId[]>> {
        const available = await this.gateway.snapshotAvailable();
        if (!available.ok) return failedWith(available.failure);
        const held = await this.gateway.snapshotHeld();
        if (!held.ok) return failedWith(held.failure);

        const { hotel, band } = available.value;
        return succeeded(candidateSet(hotel, band, held.value.hotel, held.value.band).slice(0, limit));
    }

    /** First available slots on each service, independently. */
    async browseAvailable(limit: number = this.settings.browseLimit): Promise<ReservationOutcome<AvailableSlots>> {
        const available = await this.gateway.snapshotAvailable();
        if (!available.ok) {
            this.logger.warn(`Error retrieving available slots: ${describeFailure(available.failure)}`);
            return failedWith(available.failure);
        }
        return succeeded({
            hotel: sortSlots(available.value.hotel).slice(0, limit),
            band: sortSlots(available.value.band).slice(0, limit),
        });
    }

    /**
     * Reserve a slot on both services, or on one when `side` is given.
     * A side that already holds the slot counts as satisfied and is not called again.
     */
    async reserve(slotId: SlotId, side?: ReservationSide): Promise<DualResult> {
        const sides = requestedSides(side);
        const held = await this.readHeld(sides);
        if (!held.ok) {
            return {
                slotId,
                hotel: { status: 'not_attempted' },
                band: { status: 'not_attempted' },
                outcome: failedWith(held.failure),
            };
        }
        return this.reserveMissing(slotId, held.value, sides);
    }

    /** Cancel a slot on both services (with compensation), or on one when `side` is given. */
    cancel(slotId: SlotId, side?: ReservationSide): Promise<DualResult> {
        return side ? this.dualReservation.cancelOne(slotId, side) : this.dualReservation.cancelBoth(slotId);
    }

    cancelUnmatched(): Promise<ReservationOutcome<CleanupReport>> {
        return this.cleanupEngine.cancelAllUnmatched();
    }

    cancelAll(): Promise<ReservationOutcome<CleanupReport>> {
        return this.cleanupEngine.cancelEverything();
    }

    /**
     * Secure the earliest slot available as a matched pair, releasing any later pair.
     * Success means a matched pair no later than the one held at the start is held now.
     */
    async reserveEarliest(): Promise<ReservationOutcome<EarliestReservation>> {
        const policy = { maxAttempts: this.settings.earliestMaxAttempts, backoffMs: this.settings.earliestBackoffMs };
        let step: EarliestSearchStep = startSearch();

        for (;;) {
            switch (step.state) {
                case EarliestSearchState.ATTEMPTING: {
                    const result = await this.attemptEarliest(step.attempt);
                    step = nextSearchStep(step.attempt, result, policy);
                    break;
                }
                case EarliestSearchState.RETRYING:
                    this.logger.warn(
                        `Retrying in ${step.delayMs}ms... (attempt ${step.attempt}/${policy.maxAttempts})`,
                    );
                    await sleep(step.delayMs);
                    step = { state: EarliestSearchState.ATTEMPTING, attempt: step.attempt };
                    break;
                case EarliestSearchState.EXHAUSTED:
                    this.logger.warn(`Failed to reserve earliest slot after ${step.attempts} attempts`);
                    return { kind: OutcomeKind.EXHAUSTED, attempts: step.attempts, lastFailure: step.lastFailure };
                case EarliestSearchState.SETTLED:
                    return step.outcome;
            }
        }
    }

    private async attemptEarliest(attempt: number): Promise<AttemptResult> {
        const snapshot = await this.gateway.snapshotHeld();
        if (!snapshot.ok) return { kind: 'failed', failure: snapshot.failure };
        let held = snapshot.value;

        if (held.hotel.length >= CAPACITY_PRESSURE_THRESHOLD || held.band.length >= CAPACITY_PRESSURE_THRESHOLD) {
            this.logger.warn('Potential reservation limit issue detected. Cleaning up unmatched slots first...');
            const cleanup = await this.cleanupEngine.cancelAllUnmatched(held);
            if (isSuccess(cleanup) && cleanup.payload.inconsistencies.length > 0) {
                return { kind: 'settled', outcome: inconsistent(cleanup.payload.inconsistencies[0]) };
            }

            const refreshed = await this.gateway.snapshotHeld();
            if (!refreshed.ok) return { kind: 'failed', failure: refreshed.failure };
            held = refreshed.value;
        }

        const available = await this.gateway.snapshotAvailable();
        if (!available.ok) return { kind: 'failed', failure: available.failure };

        const candidates = candidateSet(available.value.hotel, available.value.band, held.hotel, held.band).slice(
            0,
            SEARCH_CANDIDATE_LIMIT,
        );
        if (candidates.length === 0) {
            this.logger.log('No matching slots currently available.');
            return { kind: 'settled', outcome: { kind: OutcomeKind.NO_CANDIDATES } };
        }

        const target = candidates[0];
        this.logger.log(`Found earliest matching slot: ${target} (candidates: ${candidates.join(', ')})`);

        const currentPair = earliest(matchedPairs(held.hotel, held.band));
        if (currentPair !== null && currentPair <= target) {
            this.logger.log(`Already holding the earliest matching slot at ${currentPair}`);
            return {
                kind: 'settled',
                outcome: succeeded({ slotId: currentPair, alreadyHeld: true, attempts: attempt, cleanup: null }),
            };
        }

        if (currentPair !== null) {
            this.logger.log(`Cancelling current matching pair at slot ${currentPair} in favour of ${target}`);
            const { outcome } = await this.dualReservation.cancelBoth(currentPair);
            if (outcome.kind === OutcomeKind.INCONSISTENT_STATE) return { kind: 'settled', outcome };
            if (outcome.kind === OutcomeKind.SERVICE_FAILURE) return { kind: 'failed', failure: outcome.failure };
            held = { hotel: withoutSlot(held.hotel, currentPair), band: withoutSlot(held.band, currentPair) };
        }

        const { outcome } = await this.reserveMissing(target, held, [...SIDE_ORDER]);
        switch (outcome.kind) {
            case OutcomeKind.SUCCESS: {
                this.logger.log(`✅ Successfully reserved matching pair for slot ${target}`);
                const cleanup = await this.cleanupEngine.cancelAllUnmatched();
                return {
                    kind: 'settled',
                    outcome: succeeded({
                        slotId: target,
                        alreadyHeld: false,
                        attempts: attempt,
                        cleanup: isSuccess(cleanup) ? cleanup.payload : null,
                    }),
                };
            }
            case OutcomeKind.INCONSISTENT_STATE:
                return { kind: 'settled', outcome };
            case OutcomeKind.SERVICE_FAILURE:
                this.logger.warn(`Failed to reserve complete matching pair for slot ${target}`);
                return { kind: 'failed', failure: outcome.failure };
            default:
                return { kind: 'failed', failure: null };
        }
    }

    /** Reserve `slotId` on the requested sides that do not hold it yet. */
    private async reserveMissing(slotId: SlotId, held: HeldSlots, sides: ReservationSide[]): Promise<DualResult> {
        const missing = sides.filter(side => !this.heldOn(held, side).includes(slotId));
        const settle = (side: ReservationSide, result: SideResult<ReservationReceipt>): SideResult<ReservationReceipt> =>
            sides.includes(side) && !missing.includes(side) ? { status: 'already_satisfied' } : result;

        if (missing.length === 0) {
            this.logger.log(`Slot ${slotId} already held on ${sides.join(' and ')}`);
            return {
                slotId,
                hotel: settle(ReservationSide.HOTEL, { status: 'not_requested' }),
                band: settle(ReservationSide.BAND, { status: 'not_requested' }),
                outcome: succeeded(slotId),
            };
        }

        const result =
            missing.length === SIDE_ORDER.length
                ? await this.dualReservation.reserveBoth(slotId)
                : await this.dualReservation.reserveOne(slotId, missing[0]);

        return {
            ...result,
            hotel: settle(ReservationSide.HOTEL, result.hotel),
            band: settle(ReservationSide.BAND, result.band),
        };
    }

    private heldOn(held: HeldSlots, side: ReservationSide): SlotId[] {
        return side === ReservationSide.HOTEL ? held.hotel : held.band;
    }

    /** Held slots for the requested sides only; the others read as empty. */
    private async readHeld(sides: ReservationSide[]): Promise<CallResult<HeldSlots>> {
        if (sides.length === SIDE_ORDER.length) {
            return this.gateway.snapshotHeld();
        }
        const [side] = sides;
        const result = await this.gateway.listHeld(side);
        if (!result.ok) return result;
        return {
            ok: true,
            value: side === ReservationSide.HOTEL ? { hotel: result.value, band: [] } : { hotel: [], band: result.value },
        };
    }
}
