import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { BookingSettings } from '../config/booking.config';
import { ReservationSide } from '../sagas/reservation-side.enum';
import { HttpReservationService } from './http-reservation.service';
import { InMemoryReservationService } from './in-memory-reservation.service';
import { IReservationService } from './reservation-service.interface';

const logger = new Logger('ReservationServiceFactory');

/**
 * Builds the service for one side from the booking settings.
 * The HTTP backend needs both a URL and a token; without them the side runs in memory.
 */
export const createReservationService = (
    side: ReservationSide,
    settings: BookingSettings,
    httpService: HttpService,
): IReservationService => {
    const endpoint = side === ReservationSide.HOTEL ? settings.hotel : settings.band;

    if (settings.backend === 'http') {
        if (endpoint.url && endpoint.token) {
            logger.log(`Using HTTP ${side} service at ${endpoint.url}`);
            return new HttpReservationService(httpService, {
                name: side,
                baseUrl: endpoint.url,
                token: endpoint.token,
                retries: settings.retries,
                delayMs: settings.delayMs,
                timeoutMs: settings.timeoutMs,
            });
        }
        logger.warn(`⚠️ No URL or token configured for ${side} service, falling back to in-memory backend`);
    }

    logger.log(`Using in-memory ${side} service (${settings.inMemory.slotCount} slots)`);
    return InMemoryReservationService.withRandomOccupancy(
        { name: side, slotCount: settings.inMemory.slotCount, holdLimit: settings.inMemory.holdLimit },
        settings.inMemory.occupancy,
    );
};
