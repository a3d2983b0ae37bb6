import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CqrsModule } from '@nestjs/cqrs';
import { HttpModule, HttpService } from '@nestjs/axios';
import { BAND_RESERVATION_SERVICE, BOOKING_SETTINGS, HOTEL_RESERVATION_SERVICE } from './booking.constants';
import bookingConfig, { BookingSettings, loadBookingSettings } from './config/booking.config';
import { CommandHandlers } from './commands/handlers';
import { QueryHandlers } from './queries/handlers';
import { EventHandlers } from './events/handlers';
import { SlotBookingController } from './controllers/slot-booking.controller';
import { RateLimiterService } from './rate-limiting/rate-limiter.service';
import { ReservationGateway } from './services/reservation-gateway.service';
import { createReservationService } from './services/reservation-service.factory';
import { DualReservationSaga } from './sagas/dual-reservation.saga';
import { CleanupEngine } from './sagas/cleanup-engine.service';
import { ReservationCoordinator } from './sagas/reservation-coordinator.service';
import { ReservationSide } from './sagas/reservation-side.enum';

@Module({
    imports: [CqrsModule, ConfigModule.forFeature(bookingConfig), HttpModule],
    controllers: [SlotBookingController],
    providers: [
        {
            provide: BOOKING_SETTINGS,
            useFactory: (configService: ConfigService) =>
                configService.get<BookingSettings>('booking') ?? loadBookingSettings(),
            inject: [ConfigService],
        },
        {
            provide: HOTEL_RESERVATION_SERVICE,
            useFactory: (settings: BookingSettings, httpService: HttpService) =>
                createReservationService(ReservationSide.HOTEL, settings, httpService),
            inject: [BOOKING_SETTINGS, HttpService],
        },
        {
            provide: BAND_RESERVATION_SERVICE,
            useFactory: (settings: BookingSettings, httpService: HttpService) =>
                createReservationService(ReservationSide.BAND, settings, httpService),
            inject: [BOOKING_SETTINGS, HttpService],
        },
        RateLimiterService,
        ReservationGateway,
        DualReservationSaga,
        CleanupEngine,
        ReservationCoordinator,
        ...CommandHandlers,
        ...QueryHandlers,
        ...EventHandlers,
    ],
    exports: [ReservationCoordinator, BOOKING_SETTINGS],
})
export class BookingModule {}
