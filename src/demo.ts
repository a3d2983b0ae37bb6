import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './modules/app.module';
import { LoggerFactory } from './modules/logging';
import { OutcomeKind, ReservationCoordinator, describeFailure } from './modules/booking';

/**
 * Walks through the coordinator against the in-memory backend:
 * browse, reserve the earliest matched pair, show what is held, release everything.
 */
async function runDemo(): Promise<void> {
    process.env.RESERVATION_BACKEND = 'in-memory';
    process.env.RATE_LIMIT_INTERVAL_MS = process.env.RATE_LIMIT_INTERVAL_MS ?? '0';

    const logger = LoggerFactory.createFromEnvironment();
    const app = await NestFactory.createApplicationContext(AppModule, { logger });

    try {
        const coordinator = app.get(ReservationCoordinator);

        const available = await coordinator.browseAvailable(20);
        if (available.kind === OutcomeKind.SUCCESS) {
            logger.log(`Hotel available: ${available.payload.hotel.join(', ')}`);
            logger.log(`Band available: ${available.payload.band.join(', ')}`);
        }

        const earliest = await coordinator.reserveEarliest();
        switch (earliest.kind) {
            case OutcomeKind.SUCCESS:
                logger.log(`Holding matched pair at slot ${earliest.payload.slotId}`);
                break;
            case OutcomeKind.SERVICE_FAILURE:
                logger.warn(describeFailure(earliest.failure));
                break;
            default:
                logger.warn(`Earliest reservation ended with ${earliest.kind}`);
        }

        const held = await coordinator.listHeld();
        if (held.kind === OutcomeKind.SUCCESS) {
            logger.log(`Held hotel: [${held.payload.hotel.join(', ')}] band: [${held.payload.band.join(', ')}]`);
        }

        await coordinator.cancelAll();

        const after = await coordinator.listHeld();
        if (after.kind === OutcomeKind.SUCCESS) {
            const remaining = after.payload.hotel.length + after.payload.band.length;
            logger.log(remaining === 0 ? 'All reservations released' : `${remaining} slot(s) still held`);
        }
    } finally {
        await app.close();
    }
}

runDemo().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Demo failed: ${message}`);
    process.exit(1);
});
