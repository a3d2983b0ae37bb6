import { CommandHandler, ICommandHandler } from '@nestjs/cqrs';
import { Logger } from '@nestjs/common';
import { CancelSlotCommand } from '../impl/slot-booking.commands';
import { ReservationCoordinator } from '../../sagas/reservation-coordinator.service';
import { DualResult } from '../../sagas/dual-reservation.saga';

@CommandHandler(CancelSlotCommand)
export class CancelSlotHandler implements ICommandHandler<CancelSlotCommand> {
    private readonly logger = new Logger(CancelSlotHandler.name);

    constructor(private readonly coordinator: ReservationCoordinator) {}

    async execute(command: CancelSlotCommand): Promise<DualResult> {
        this.logger.log(`Executing CancelSlotCommand for slot ${command.slotId} (${command.side ?? 'both'})`);
        return this.coordinator.cancel(command.slotId, command.side);
    }
}
