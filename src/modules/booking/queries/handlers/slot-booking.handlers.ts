import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { GetAvailableSlotsQuery, GetCandidateSlotsQuery, GetHeldSlotsQuery } from '../impl/slot-booking.queries';
import { ReservationCoordinator } from '../../sagas/reservation-coordinator.service';
import { AvailableSlots, HeldSlots, ReservationOutcome } from '../../outcomes/reservation-outcome';
import { SlotId } from '../../sagas/reservation-side.enum';

@QueryHandler(GetHeldSlotsQuery)
export class GetHeldSlotsHandler implements IQueryHandler<GetHeldSlotsQuery> {
    constructor(private readonly coordinator: ReservationCoordinator) {}

    execute(): Promise<ReservationOutcome<HeldSlots>> {
        return this.coordinator.listHeld();
    }
}

@QueryHandler(GetCandidateSlotsQuery)
export class GetCandidateSlotsHandler implements IQueryHandler<GetCandidateSlotsQuery> {
    constructor(private readonly coordinator: ReservationCoordinator) {}

    execute(query: GetCandidateSlotsQuery): Promise<ReservationOutcome<SlotId[]>> {
        return this.coordinator.candidateSlots(query.limit);
    }
}

@QueryHandler(GetAvailableSlotsQuery)
export class GetAvailableSlotsHandler implements IQueryHandler<GetAvailableSlotsQuery> {
    constructor(private readonly coordinator: ReservationCoordinator) {}

    execute(query: GetAvailableSlotsQuery): Promise<ReservationOutcome<AvailableSlots>> {
        return this.coordinator.browseAvailable(query.limit);
    }
}
