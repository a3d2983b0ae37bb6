import { CommandHandler, ICommandHandler } from '@nestjs/cqrs';
import { Logger } from '@nestjs/common';
import { CancelAllCommand, CancelUnmatchedCommand } from '../impl/slot-booking.commands';
import { ReservationCoordinator } from '../../sagas/reservation-coordinator.service';
import { CleanupReport, ReservationOutcome } from '../../outcomes/reservation-outcome';

@CommandHandler(CancelUnmatchedCommand)
export class CancelUnmatchedHandler implements ICommandHandler<CancelUnmatchedCommand> {
    private readonly logger = new Logger(CancelUnmatchedHandler.name);

    constructor(private readonly coordinator: ReservationCoordinator) {}

    async execute(): Promise<ReservationOutcome<CleanupReport>> {
        this.logger.log('Executing CancelUnmatchedCommand');
        return this.coordinator.cancelUnmatched();
    }
}

@CommandHandler(CancelAllCommand)
export class CancelAllHandler implements ICommandHandler<CancelAllCommand> {
    private readonly logger = new Logger(CancelAllHandler.name);

    constructor(private readonly coordinator: ReservationCoordinator) {}

    async execute(): Promise<ReservationOutcome<CleanupReport>> {
        this.logger.log('Executing CancelAllCommand');
        return this.coordinator.cancelAll();
    }
}
