import { Injectable, Logger } from '@nestjs/common';
import { EventBus } from '@nestjs/cqrs';
import { CompensationFailedEvent } from '../events/impl/compensation-failed.event';
import {
    DualOperationResult,
    InconsistentStateDetail,
    SideResult,
    describeFailure,
    failedWith,
    inconsistent,
    succeeded,
} from '../outcomes/reservation-outcome';
import { CallResult, ReservationGateway } from '../services/reservation-gateway.service';
import { ReservationReceipt } from '../services/reservation-service.interface';
import { ReservationSide, ServiceOperation, SlotId } from './reservation-side.enum';

type SideStep = (side: ReservationSide, slotId: SlotId) => Promise<CallResult<ReservationReceipt>>;

interface PairedAction {
    label: string;
    forward: SideStep;
    compensation: ServiceOperation.RELEASE | ServiceOperation.RESERVE;
    undo: SideStep;
}

export type DualResult = DualOperationResult<ReservationReceipt>;

/**
 * Dual Reservation Saga
 *
 * Makes a reserve or cancel on both services atomic in effect. Hotel always goes first.
 * When band fails after hotel succeeded, the hotel step is undone:
 *   reserve → release hotel
 *   cancel  → re-reserve hotel
 * A failed undo is not retried. It is returned as an inconsistent-state outcome and
 * published as a CompensationFailedEvent.
 */
@Injectable()
export class DualReservationSaga {
    private readonly logger = new Logger(DualReservationSaga.name);

    private readonly reserveAction: PairedAction = {
        label: 'reserve',
        forward: (side, slotId) => this.gateway.reserve(side, slotId),
        compensation: ServiceOperation.RELEASE,
        undo: (side, slotId) => this.gateway.release(side, slotId),
    };

    private readonly cancelAction: PairedAction = {
        label: 'cancel',
        forward: (side, slotId) => this.gateway.release(side, slotId),
        compensation: ServiceOperation.RESERVE,
        undo: (side, slotId) => this.gateway.reserve(side, slotId),
    };

    constructor(private readonly gateway: ReservationGateway, private readonly eventBus: EventBus) {}

    reserveBoth(slotId: SlotId): Promise<DualResult> {
        return this.runPaired(slotId, this.reserveAction);
    }

    cancelBoth(slotId: SlotId): Promise<DualResult> {
        return this.runPaired(slotId, this.cancelAction);
    }

    /** Reserve on one side only. Nothing to roll back. */
    reserveOne(slotId: SlotId, side: ReservationSide): Promise<DualResult> {
        return this.runSingle(slotId, side, this.reserveAction);
    }

    cancelOne(slotId: SlotId, side: ReservationSide): Promise<DualResult> {
        return this.runSingle(slotId, side, this.cancelAction);
    }

    private async runSingle(slotId: SlotId, side: ReservationSide, action: PairedAction): Promise<DualResult> {
        const result = await action.forward(side, slotId);
        const sideResult: SideResult<ReservationReceipt> = result.ok
            ? { status: 'succeeded', receipt: result.value }
            : { status: 'failed', failure: result.failure };

        if (result.ok) {
            this.logger.log(`✅ ${side} slot ${slotId}: ${action.label} succeeded`);
        } else {
            this.logger.warn(`❌ ${describeFailure(result.failure)}`);
        }

        return {
            slotId,
            hotel: side === ReservationSide.HOTEL ? sideResult : { status: 'not_requested' },
            band: side === ReservationSide.BAND ? sideResult : { status: 'not_requested' },
            outcome: result.ok ? succeeded(slotId) : failedWith(result.failure),
        };
    }

    private async runPaired(slotId: SlotId, action: PairedAction): Promise<DualResult> {
        const hotel = await action.forward(ReservationSide.HOTEL, slotId);
        if (!hotel.ok) {
            this.logger.warn(`❌ ${describeFailure(hotel.failure)}; band not attempted`);
            return {
                slotId,
                hotel: { status: 'failed', failure: hotel.failure },
                band: { status: 'not_attempted' },
                outcome: failedWith(hotel.failure),
            };
        }

        const band = await action.forward(ReservationSide.BAND, slotId);
        if (band.ok) {
            this.logger.log(`✅ Slot ${slotId}: ${action.label} succeeded on hotel and band`);
            return {
                slotId,
                hotel: { status: 'succeeded', receipt: hotel.value },
                band: { status: 'succeeded', receipt: band.value },
                outcome: succeeded(slotId),
            };
        }

        this.logger.warn(`🔄 ${describeFailure(band.failure)}; compensating hotel with ${action.compensation}`);
        const undo = await action.undo(ReservationSide.HOTEL, slotId);
        if (undo.ok) {
            this.logger.log(`✓ Compensated: hotel slot ${slotId} ${action.compensation} succeeded`);
            return {
                slotId,
                hotel: { status: 'compensated', receipt: hotel.value },
                band: { status: 'failed', failure: band.failure },
                outcome: failedWith(band.failure),
            };
        }

        const detail: InconsistentStateDetail = {
            slotId,
            side: ReservationSide.HOTEL,
            compensation: action.compensation,
            cause: band.failure,
            compensationFailure: undo.failure,
            message: `System may be in an inconsistent state for slot ${slotId}: hotel ${action.compensation} failed after band ${action.label} failed`,
        };
        this.logger.error(`❌ ${detail.message}`);
        this.eventBus.publish(new CompensationFailedEvent(detail));

        return {
            slotId,
            hotel: { status: 'succeeded', receipt: hotel.value },
            band: { status: 'failed', failure: band.failure },
            outcome: inconsistent(detail),
        };
    }
}
