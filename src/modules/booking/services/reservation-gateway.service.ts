import { Inject, Injectable } from '@nestjs/common';
import { BAND_RESERVATION_SERVICE, HOTEL_RESERVATION_SERVICE } from '../booking.constants';
import { isReservationServiceError } from '../errors/reservation.errors';
import { AvailableSlots, HeldSlots, ServiceFailure } from '../outcomes/reservation-outcome';
import { RateLimiterService } from '../rate-limiting/rate-limiter.service';
import { ReservationSide, ServiceOperation, SlotId } from '../sagas/reservation-side.enum';
import { IReservationService, ReservationReceipt } from './reservation-service.interface';

export type CallResult<T> = { ok: true; value: T } | { ok: false; failure: ServiceFailure };

/**
 * Single entry point to both reservation services.
 *
 * Every call waits its turn on the shared rate limiter and comes back as a CallResult:
 * typed service errors become a ServiceFailure tagged with side, operation and slot.
 * Any other error is a fault and propagates.
 */
@Injectable()
export class ReservationGateway {
    constructor(
        @Inject(HOTEL_RESERVATION_SERVICE) private readonly hotel: IReservationService,
        @Inject(BAND_RESERVATION_SERVICE) private readonly band: IReservationService,
        private readonly rateLimiter: RateLimiterService,
    ) {}

    service(side: ReservationSide): IReservationService {
        return side === ReservationSide.HOTEL ? this.hotel : this.band;
    }

    listAvailable(side: ReservationSide): Promise<CallResult<SlotId[]>> {
        return this.call(side, ServiceOperation.LIST_AVAILABLE, undefined, service => service.listAvailable());
    }

    listHeld(side: ReservationSide): Promise<CallResult<SlotId[]>> {
        return this.call(side, ServiceOperation.LIST_HELD, undefined, service => service.listHeld());
    }

    reserve(side: ReservationSide, slotId: SlotId): Promise<CallResult<ReservationReceipt>> {
        return this.call(side, ServiceOperation.RESERVE, slotId, service => service.reserve(slotId));
    }

    release(side: ReservationSide, slotId: SlotId): Promise<CallResult<ReservationReceipt>> {
        return this.call(side, ServiceOperation.RELEASE, slotId, service => service.release(slotId));
    }

    /** Held slots on both sides, hotel first. */
    async snapshotHeld(): Promise<CallResult<HeldSlots>> {
        const hotel = await this.listHeld(ReservationSide.HOTEL);
        if (!hotel.ok) return hotel;
        const band = await this.listHeld(ReservationSide.BAND);
        if (!band.ok) return band;
        return { ok: true, value: { hotel: hotel.value, band: band.value } };
    }

    /** Available slots on both sides, hotel first. */
    async snapshotAvailable(): Promise<CallResult<AvailableSlots>> {
        const hotel = await this.listAvailable(ReservationSide.HOTEL);
        if (!hotel.ok) return hotel;
        const band = await this.listAvailable(ReservationSide.BAND);
        if (!band.ok) return band;
        return { ok: true, value: { hotel: hotel.value, band: band.value } };
    }

    private async call<T>(
        side: ReservationSide,
        operation: ServiceOperation,
        slotId: SlotId | undefined,
        invoke: (service: IReservationService) => Promise<T>,
    ): Promise<CallResult<T>> {
        try {
            const value = await this.rateLimiter.schedule(() => invoke(this.service(side)));
            return { ok: true, value };
        } catch (error) {
            if (!isReservationServiceError(error)) {
                throw error;
            }
            return {
                ok: false,
                failure: { side, operation, slotId, errorKind: error.kind, message: error.message },
            };
        }
    }
}
