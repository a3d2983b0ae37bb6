import { CommandHandler, ICommandHandler } from '@nestjs/cqrs';
import { Logger } from '@nestjs/common';
import { ReserveSlotCommand } from '../impl/slot-booking.commands';
import { ReservationCoordinator } from '../../sagas/reservation-coordinator.service';
import { DualResult } from '../../sagas/dual-reservation.saga';

@CommandHandler(ReserveSlotCommand)
export class ReserveSlotHandler implements ICommandHandler<ReserveSlotCommand> {
    private readonly logger = new Logger(ReserveSlotHandler.name);

    constructor(private readonly coordinator: ReservationCoordinator) {}

    async execute(command: ReserveSlotCommand): Promise<DualResult> {
        this.logger.log(`Executing ReserveSlotCommand for slot ${command.slotId} (${command.side ?? 'both'})`);
        return this.coordinator.reserve(command.slotId, command.side);
    }
}
