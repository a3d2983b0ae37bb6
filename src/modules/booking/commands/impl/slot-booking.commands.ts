import { Command } from '@nestjs/cqrs';
import { CleanupReport, EarliestReservation, ReservationOutcome } from '../../outcomes/reservation-outcome';
import { DualResult } from '../../sagas/dual-reservation.saga';
import { ReservationSide, SlotId } from '../../sagas/reservation-side.enum';

export class ReserveSlotCommand extends Command<DualResult> {
    constructor(public readonly slotId: SlotId, public readonly side?: ReservationSide) {
        super();
    }
}

export class CancelSlotCommand extends Command<DualResult> {
    constructor(public readonly slotId: SlotId, public readonly side?: ReservationSide) {
        super();
    }
}

export class ReserveEarliestCommand extends Command<ReservationOutcome<EarliestReservation>> {}

export class CancelUnmatchedCommand extends Command<ReservationOutcome<CleanupReport>> {}

export class CancelAllCommand extends Command<ReservationOutcome<CleanupReport>> {}
