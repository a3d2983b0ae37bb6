import { CommandHandler, ICommandHandler } from '@nestjs/cqrs';
import { Logger } from '@nestjs/common';
import { ReserveEarliestCommand } from '../impl/slot-booking.commands';
import { ReservationCoordinator } from '../../sagas/reservation-coordinator.service';
import { EarliestReservation, OutcomeKind, ReservationOutcome } from '../../outcomes/reservation-outcome';

@CommandHandler(ReserveEarliestCommand)
export class ReserveEarliestHandler implements ICommandHandler<ReserveEarliestCommand> {
    private readonly logger = new Logger(ReserveEarliestHandler.name);

    constructor(private readonly coordinator: ReservationCoordinator) {}

    async execute(): Promise<ReservationOutcome<EarliestReservation>> {
        this.logger.log('Executing ReserveEarliestCommand');

        const outcome = await this.coordinator.reserveEarliest();

        if (outcome.kind === OutcomeKind.SUCCESS) {
            this.logger.log(`Earliest matching pair held at slot ${outcome.payload.slotId}`);
        } else if (outcome.kind === OutcomeKind.INCONSISTENT_STATE) {
            this.logger.error(`Earliest reservation left an inconsistent state: ${outcome.detail.message}`);
        } else {
            this.logger.warn(`Earliest reservation ended with ${outcome.kind}`);
        }

        return outcome;
    }
}
