import { Query } from '@nestjs/cqrs';
import { AvailableSlots, HeldSlots, ReservationOutcome } from '../../outcomes/reservation-outcome';
import { SlotId } from '../../sagas/reservation-side.enum';

export class GetHeldSlotsQuery extends Query<ReservationOutcome<HeldSlots>> {}

export class GetCandidateSlotsQuery extends Query<ReservationOutcome<SlotId[]>> {
    constructor(public readonly limit?: number) {
        super();
    }
}

export class GetAvailableSlotsQuery extends Query<ReservationOutcome<AvailableSlots>> {
    constructor(public readonly limit?: number) {
        super();
    }
}
