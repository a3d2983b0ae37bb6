import { EventsHandler, IEventHandler } from '@nestjs/cqrs';
import { Logger } from '@nestjs/common';
import { CompensationFailedEvent } from '../impl/compensation-failed.event';
import { describeFailure } from '../../outcomes/reservation-outcome';

/**
 * Compensation Failed Event Handler
 * Dead-letter record for compensations that did not go through. Nothing retries them
 * automatically; the slot needs a manual look or a cleanup run.
 */
@EventsHandler(CompensationFailedEvent)
export class CompensationFailedHandler implements IEventHandler<CompensationFailedEvent> {
    private readonly logger = new Logger(CompensationFailedHandler.name);

    handle(event: CompensationFailedEvent): void {
        const { detail } = event;
        this.logger.error(
            `📬 Dead Letter Queue: ${detail.compensation} compensation failed on ${detail.side} for slot ${detail.slotId}`,
        );
        this.logger.error(`Cause: ${describeFailure(detail.cause)}`);
        this.logger.error(`Compensation error: ${describeFailure(detail.compensationFailure)}`);
        this.logger.error(`Timestamp: ${event.timestamp.toISOString()}`);
        this.logger.warn(`⚠️ System may be in an inconsistent state for slot ${detail.slotId}`);
    }
}
