import {
    NotProcessedError,
    ReservationErrorKind,
    SlotUnavailableError,
    TransportError,
} from '@/modules/booking/errors/reservation.errors';
import { OutcomeKind } from '@/modules/booking/outcomes/reservation-outcome';
import { ReservationSide, ServiceOperation } from '@/modules/booking/sagas/reservation-side.enum';
import { BookingHarness, createBookingHarness, takenExcept } from './booking-test.module';

describe('ReservationCoordinator', () => {
    let harness: BookingHarness;

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('queries', () => {
        beforeEach(async () => {
            harness = await createBookingHarness({
                hotelTaken: takenExcept([3, 7, 9, 12], 20),
                bandTaken: takenExcept([5, 7, 10, 12], 20),
            });
        });

        it('listHeld should return sorted holds per side', async () => {
            await harness.hotel.reserve(12);
            await harness.hotel.reserve(3);

            expect(await harness.coordinator.listHeld()).toEqual({
                kind: OutcomeKind.SUCCESS,
                payload: { hotel: [3, 12], band: [] },
            });
        });

        it('candidateSlots should list slots that can become a matched pair', async () => {
            expect(await harness.coordinator.candidateSlots()).toEqual({ kind: OutcomeKind.SUCCESS, payload: [7, 12] });
        });

        it('candidateSlots should include a hold waiting for its counterpart', async () => {
            await harness.band.reserve(5);
            harness.hotel.vacate(5);

            expect(await harness.coordinator.candidateSlots(1)).toEqual({ kind: OutcomeKind.SUCCESS, payload: [5] });
        });

        it('browseAvailable should list each side independently', async () => {
            expect(await harness.coordinator.browseAvailable(2)).toEqual({
                kind: OutcomeKind.SUCCESS,
                payload: { hotel: [3, 7], band: [5, 7] },
            });
        });

        it('should report a failed read', async () => {
            jest.spyOn(harness.hotel, 'listAvailable').mockRejectedValueOnce(new TransportError('GET failed'));

            expect(await harness.coordinator.browseAvailable()).toEqual({
                kind: OutcomeKind.SERVICE_FAILURE,
                failure: {
                    side: ReservationSide.HOTEL,
                    operation: ServiceOperation.LIST_AVAILABLE,
                    slotId: undefined,
                    errorKind: ReservationErrorKind.TRANSPORT,
                    message: 'GET failed',
                },
            });
        });
    });

    describe('reserve', () => {
        beforeEach(async () => {
            harness = await createBookingHarness({ bandTaken: [7] });
        });

        it('should reserve both sides', async () => {
            const result = await harness.coordinator.reserve(4);

            expect(result.outcome).toEqual({ kind: OutcomeKind.SUCCESS, payload: 4 });
            expect(await harness.hotel.listHeld()).toEqual([4]);
            expect(await harness.band.listHeld()).toEqual([4]);
        });

        it('should roll back hotel when band reports the slot unavailable', async () => {
            const result = await harness.coordinator.reserve(7);

            expect(result.outcome).toEqual({
                kind: OutcomeKind.SERVICE_FAILURE,
                failure: {
                    side: ReservationSide.BAND,
                    operation: ServiceOperation.RESERVE,
                    slotId: 7,
                    errorKind: ReservationErrorKind.SLOT_UNAVAILABLE,
                    message: 'Slot 7 is already taken',
                },
            });
            expect(result.hotel.status).toBe('compensated');
            expect(await harness.hotel.listHeld()).toEqual([]);
            expect(await harness.band.listHeld()).toEqual([]);
        });

        it('should only reserve the requested side', async () => {
            const result = await harness.coordinator.reserve(4, ReservationSide.HOTEL);

            expect(result).toEqual({
                slotId: 4,
                hotel: { status: 'succeeded', receipt: { slotId: 4, message: 'Slot reserved' } },
                band: { status: 'not_requested' },
                outcome: { kind: OutcomeKind.SUCCESS, payload: 4 },
            });
            expect(await harness.band.listHeld()).toEqual([]);
        });

        it('should not call a side that already holds the slot', async () => {
            await harness.hotel.reserve(4);
            const hotelReserve = jest.spyOn(harness.hotel, 'reserve');

            const result = await harness.coordinator.reserve(4);

            expect(hotelReserve).not.toHaveBeenCalled();
            expect(result.hotel).toEqual({ status: 'already_satisfied' });
            expect(result.band).toEqual({ status: 'succeeded', receipt: { slotId: 4, message: 'Slot reserved' } });
            expect(result.outcome).toEqual({ kind: OutcomeKind.SUCCESS, payload: 4 });
        });

        it('should succeed without calls when both sides hold the slot', async () => {
            await harness.hotel.reserve(4);
            await harness.band.reserve(4);

            const result = await harness.coordinator.reserve(4);

            expect(result.hotel).toEqual({ status: 'already_satisfied' });
            expect(result.band).toEqual({ status: 'already_satisfied' });
            expect(result.outcome).toEqual({ kind: OutcomeKind.SUCCESS, payload: 4 });
        });

        it('should not attempt anything when held slots cannot be read', async () => {
            jest.spyOn(harness.hotel, 'listHeld').mockRejectedValueOnce(new TransportError('GET failed'));

            const result = await harness.coordinator.reserve(4);

            expect(result.hotel).toEqual({ status: 'not_attempted' });
            expect(result.band).toEqual({ status: 'not_attempted' });
            expect(result.outcome.kind).toBe(OutcomeKind.SERVICE_FAILURE);
        });
    });

    describe('cancel', () => {
        beforeEach(async () => {
            harness = await createBookingHarness();
            await harness.hotel.reserve(6);
            await harness.band.reserve(6);
        });

        it('should cancel both sides', async () => {
            const result = await harness.coordinator.cancel(6);

            expect(result.outcome).toEqual({ kind: OutcomeKind.SUCCESS, payload: 6 });
            expect(await harness.hotel.listHeld()).toEqual([]);
            expect(await harness.band.listHeld()).toEqual([]);
        });

        it('should cancel one side only', async () => {
            await harness.coordinator.cancel(6, ReservationSide.BAND);

            expect(await harness.hotel.listHeld()).toEqual([6]);
            expect(await harness.band.listHeld()).toEqual([]);
        });

        it('cancelAll should release everything', async () => {
            await harness.hotel.reserve(9);

            await harness.coordinator.cancelAll();

            expect(await harness.hotel.listHeld()).toEqual([]);
            expect(await harness.band.listHeld()).toEqual([]);
        });

        it('cancelUnmatched should keep the pair and drop the rest', async () => {
            await harness.hotel.reserve(9);

            const outcome = await harness.coordinator.cancelUnmatched();

            expect(outcome).toMatchObject({
                kind: OutcomeKind.SUCCESS,
                payload: { released: { hotel: [9], band: [] }, keptPair: 6 },
            });
        });
    });

    describe('reserveEarliest', () => {
        it('should reserve the earliest slot available on both services', async () => {
            harness = await createBookingHarness({
                hotelTaken: takenExcept([3, 7, 9], 20),
                bandTaken: takenExcept([5, 7, 10], 20),
            });

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toEqual({
                kind: OutcomeKind.SUCCESS,
                payload: {
                    slotId: 7,
                    alreadyHeld: false,
                    attempts: 1,
                    cleanup: {
                        released: { hotel: [], band: [] },
                        cancelledPairs: [],
                        keptPair: 7,
                        failures: [],
                        inconsistencies: [],
                    },
                },
            });
            expect(await harness.hotel.listHeld()).toEqual([7]);
            expect(await harness.band.listHeld()).toEqual([7]);
        });

        it('should swap a held pair for an earlier one', async () => {
            harness = await createBookingHarness({
                hotelTaken: takenExcept([4, 7], 20),
                bandTaken: takenExcept([4, 7], 20),
            });
            await harness.hotel.reserve(7);
            await harness.band.reserve(7);

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toMatchObject({ kind: OutcomeKind.SUCCESS, payload: { slotId: 4, alreadyHeld: false } });
            expect(await harness.hotel.listHeld()).toEqual([4]);
            expect(await harness.band.listHeld()).toEqual([4]);
        });

        it('should keep a held pair that is already the earliest', async () => {
            harness = await createBookingHarness({ slotCount: 10, hotelTaken: [1, 2], bandTaken: [1, 2] });
            await harness.hotel.reserve(3);
            await harness.band.reserve(3);
            const hotelReserve = jest.spyOn(harness.hotel, 'reserve');

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toEqual({
                kind: OutcomeKind.SUCCESS,
                payload: { slotId: 3, alreadyHeld: true, attempts: 1, cleanup: null },
            });
            expect(hotelReserve).not.toHaveBeenCalled();
        });

        it('should reserve only the missing side when the earliest slot is held on one side', async () => {
            harness = await createBookingHarness({ slotCount: 10, hotelTaken: [1, 2], bandTaken: [1, 2] });
            await harness.hotel.reserve(3);
            const hotelReserve = jest.spyOn(harness.hotel, 'reserve');
            const bandReserve = jest.spyOn(harness.band, 'reserve');

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toMatchObject({
                kind: OutcomeKind.SUCCESS,
                payload: { slotId: 3, alreadyHeld: false, attempts: 1, cleanup: { keptPair: 3, cancelledPairs: [] } },
            });
            expect(hotelReserve).not.toHaveBeenCalled();
            expect(bandReserve).toHaveBeenCalledTimes(1);
            expect(bandReserve).toHaveBeenCalledWith(3);
            expect(await harness.hotel.listHeld()).toEqual([3]);
            expect(await harness.band.listHeld()).toEqual([3]);
        });

        it('should count a failed cancel of the later pair as an attempt and reserve nothing in it', async () => {
            harness = await createBookingHarness({
                hotelTaken: takenExcept([4, 7], 20),
                bandTaken: takenExcept([4, 7], 20),
            });
            await harness.hotel.reserve(7);
            await harness.band.reserve(7);
            const hotelRelease = jest
                .spyOn(harness.hotel, 'release')
                .mockRejectedValueOnce(new NotProcessedError('Not processed', 404));
            const hotelReserve = jest.spyOn(harness.hotel, 'reserve');

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toMatchObject({ kind: OutcomeKind.SUCCESS, payload: { slotId: 4, attempts: 2 } });
            expect(hotelRelease).toHaveBeenCalledTimes(2);
            expect(hotelReserve).toHaveBeenCalledTimes(1);
            expect(hotelReserve).toHaveBeenCalledWith(4);
            expect(hotelReserve.mock.invocationCallOrder[0]).toBeGreaterThan(hotelRelease.mock.invocationCallOrder[1]);
            expect(await harness.hotel.listHeld()).toEqual([4]);
            expect(await harness.band.listHeld()).toEqual([4]);
        });

        it('should clean up first when a side is at its hold limit', async () => {
            harness = await createBookingHarness({ slotCount: 10 });
            await harness.hotel.reserve(2);
            await harness.hotel.reserve(5);
            await harness.band.reserve(5);

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toMatchObject({ kind: OutcomeKind.SUCCESS, payload: { slotId: 1, alreadyHeld: false } });
            expect(await harness.hotel.listHeld()).toEqual([1]);
            expect(await harness.band.listHeld()).toEqual([1]);
        });

        it('should report when no slot can be matched', async () => {
            harness = await createBookingHarness({
                slotCount: 4,
                hotelTaken: takenExcept([1], 4),
                bandTaken: takenExcept([2], 4),
            });

            expect(await harness.coordinator.reserveEarliest()).toEqual({ kind: OutcomeKind.NO_CANDIDATES });
        });

        it('should retry after a failed attempt', async () => {
            harness = await createBookingHarness({ slotCount: 10 });
            jest.spyOn(harness.band, 'reserve').mockRejectedValueOnce(new NotProcessedError('Not processed', 404));

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toMatchObject({ kind: OutcomeKind.SUCCESS, payload: { slotId: 1, attempts: 2 } });
            expect(await harness.hotel.listHeld()).toEqual([1]);
            expect(await harness.band.listHeld()).toEqual([1]);
        });

        it('should give up after the configured attempts', async () => {
            harness = await createBookingHarness({ settings: { earliestMaxAttempts: 3 } });
            const listHeld = jest
                .spyOn(harness.hotel, 'listHeld')
                .mockRejectedValue(new TransportError('GET failed'));

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toEqual({
                kind: OutcomeKind.EXHAUSTED,
                attempts: 3,
                lastFailure: {
                    side: ReservationSide.HOTEL,
                    operation: ServiceOperation.LIST_HELD,
                    slotId: undefined,
                    errorKind: ReservationErrorKind.TRANSPORT,
                    message: 'GET failed',
                },
            });
            expect(listHeld).toHaveBeenCalledTimes(3);
        });

        it('should stop on an inconsistent state', async () => {
            harness = await createBookingHarness({ slotCount: 10 });
            const bandReserve = jest
                .spyOn(harness.band, 'reserve')
                .mockRejectedValueOnce(new SlotUnavailableError('Slot 1 is already taken', 409));
            jest.spyOn(harness.hotel, 'release').mockRejectedValueOnce(new NotProcessedError('Not processed', 404));

            const outcome = await harness.coordinator.reserveEarliest();

            expect(outcome).toMatchObject({
                kind: OutcomeKind.INCONSISTENT_STATE,
                detail: { slotId: 1, side: ReservationSide.HOTEL, compensation: ServiceOperation.RELEASE },
            });
            expect(bandReserve).toHaveBeenCalledTimes(1);
            expect(harness.eventBus.publish).toHaveBeenCalledTimes(1);
            expect(await harness.hotel.listHeld()).toEqual([1]);
        });
    });
});
