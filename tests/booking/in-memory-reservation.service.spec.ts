import { InMemoryReservationService } from '@/modules/booking/services/in-memory-reservation.service';
import {
    BadSlotError,
    ReservationErrorKind,
    ReservationLimitError,
    SlotUnavailableError,
} from '@/modules/booking/errors/reservation.errors';

describe('InMemoryReservationService', () => {
    let service: InMemoryReservationService;

    beforeEach(() => {
        service = new InMemoryReservationService({ name: 'hotel', slotCount: 10, holdLimit: 2, takenSlots: [2, 4] });
    });

    it('should list slots that are neither taken nor held', async () => {
        await service.reserve(1);

        expect(await service.listAvailable()).toEqual([3, 5, 6, 7, 8, 9, 10]);
        expect(await service.listHeld()).toEqual([1]);
    });

    it('should return a receipt on reserve and release', async () => {
        expect(await service.reserve(5)).toEqual({ slotId: 5, message: 'Slot reserved' });
        expect(await service.release(5)).toEqual({ slotId: 5, message: 'Slot released' });
        expect(await service.listHeld()).toEqual([]);
    });

    it('should reject a taken slot', async () => {
        await expect(service.reserve(2)).rejects.toBeInstanceOf(SlotUnavailableError);
    });

    it('should reject a slot this client already holds', async () => {
        await service.reserve(3);

        await expect(service.reserve(3)).rejects.toThrow('Slot 3 is already taken');
    });

    it('should check the hold limit before availability', async () => {
        await service.reserve(1);
        await service.reserve(3);

        const error = await service.reserve(2).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ReservationLimitError);
        expect(error).toMatchObject({ kind: ReservationErrorKind.RESERVATION_LIMIT_EXCEEDED, status: 451 });
    });

    it('should reject slots out of range', async () => {
        await expect(service.reserve(0)).rejects.toBeInstanceOf(BadSlotError);
        await expect(service.release(11)).rejects.toThrow('Slot 11 does not exist');
    });

    it('should treat releasing a slot that is not held as a no-op', async () => {
        await expect(service.release(6)).resolves.toEqual({ slotId: 6, message: 'Slot released' });
        expect(await service.listAvailable()).toContain(6);
    });

    it('should let other clients occupy and vacate slots', async () => {
        service.occupy(7);
        expect(await service.listAvailable()).not.toContain(7);

        service.vacate(2);
        expect(await service.listAvailable()).toContain(2);
    });

    it('withRandomOccupancy should take the slots the random source selects', async () => {
        const draws = [0.1, 0.9, 0.2, 0.8];
        let index = 0;
        const seeded = InMemoryReservationService.withRandomOccupancy(
            { name: 'band', slotCount: 4, holdLimit: 2 },
            0.5,
            () => draws[index++],
        );

        expect(await seeded.listAvailable()).toEqual([2, 4]);
    });
});
