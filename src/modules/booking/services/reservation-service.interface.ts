import { ReservationBackend } from '../config/booking.config';
import { SlotId } from '../sagas/reservation-side.enum';

export interface ReservationReceipt {
    slotId: SlotId;
    message: string;
}

/**
 * The four primitives a remote reservation service exposes.
 * Implementations throw a ReservationServiceError subclass on failure.
 */
export interface IReservationService {
    /** Backend actually serving this side. */
    readonly backend: ReservationBackend;
    listAvailable(): Promise<SlotId[]>;
    listHeld(): Promise<SlotId[]>;
    reserve(slotId: SlotId): Promise<ReservationReceipt>;
    /** Releasing a slot that is not held succeeds without effect. */
    release(slotId: SlotId): Promise<ReservationReceipt>;
}
