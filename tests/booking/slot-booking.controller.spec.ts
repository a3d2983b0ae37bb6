import { Test, TestingModule } from '@nestjs/testing';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { SlotBookingController } from '@/modules/booking/controllers/slot-booking.controller';
import {
    CancelAllCommand,
    CancelSlotCommand,
    ReserveEarliestCommand,
    ReserveSlotCommand,
} from '@/modules/booking/commands/impl/slot-booking.commands';
import { GetCandidateSlotsQuery, GetHeldSlotsQuery } from '@/modules/booking/queries/impl/slot-booking.queries';
import { OutcomeKind } from '@/modules/booking/outcomes/reservation-outcome';
import { ReservationErrorKind } from '@/modules/booking/errors/reservation.errors';
import { ReservationSide, ServiceOperation } from '@/modules/booking/sagas/reservation-side.enum';
import { DualResult } from '@/modules/booking/sagas/dual-reservation.saga';

describe('SlotBookingController', () => {
    let controller: SlotBookingController;

    const mockCommandBus = {
        execute: jest.fn(),
    };

    const mockQueryBus = {
        execute: jest.fn(),
    };

    beforeEach(async () => {
        const module: TestingModule = await Test.createTestingModule({
            controllers: [SlotBookingController],
            providers: [
                { provide: CommandBus, useValue: mockCommandBus },
                { provide: QueryBus, useValue: mockQueryBus },
            ],
        }).compile();

        controller = module.get<SlotBookingController>(SlotBookingController);
    });

    afterEach(() => {
        jest.clearAllMocks();
    });

    it('should be defined', () => {
        expect(controller).toBeDefined();
    });

    describe('getHeld', () => {
        it('should wrap held slots in a success response', async () => {
            mockQueryBus.execute.mockResolvedValue({ kind: OutcomeKind.SUCCESS, payload: { hotel: [3], band: [3] } });

            const result = await controller.getHeld();

            expect(result).toEqual({ success: true, outcome: OutcomeKind.SUCCESS, data: { hotel: [3], band: [3] } });
            expect(mockQueryBus.execute).toHaveBeenCalledWith(expect.any(GetHeldSlotsQuery));
        });
    });

    describe('getCandidates', () => {
        it('should pass the limit through', async () => {
            mockQueryBus.execute.mockResolvedValue({ kind: OutcomeKind.SUCCESS, payload: [2, 4] });

            await controller.getCandidates({ limit: 2 });

            expect(mockQueryBus.execute).toHaveBeenCalledWith(new GetCandidateSlotsQuery(2));
        });
    });

    describe('reserve', () => {
        it('should return side results with a failed outcome', async () => {
            const failure = {
                side: ReservationSide.BAND,
                operation: ServiceOperation.RESERVE,
                slotId: 7,
                errorKind: ReservationErrorKind.SLOT_UNAVAILABLE,
                message: 'Slot 7 is already taken',
            };
            const dualResult: DualResult = {
                slotId: 7,
                hotel: { status: 'compensated', receipt: { slotId: 7, message: 'Slot reserved' } },
                band: { status: 'failed', failure },
                outcome: { kind: OutcomeKind.SERVICE_FAILURE, failure },
            };
            mockCommandBus.execute.mockResolvedValue(dualResult);

            const result = await controller.reserve({ slotId: 7 }, {});

            expect(mockCommandBus.execute).toHaveBeenCalledWith(new ReserveSlotCommand(7, undefined));
            expect(result).toEqual({
                success: false,
                outcome: OutcomeKind.SERVICE_FAILURE,
                failure,
                hotel: dualResult.hotel,
                band: dualResult.band,
            });
        });
    });

    describe('cancel', () => {
        it('should send the requested side', async () => {
            mockCommandBus.execute.mockResolvedValue({
                slotId: 3,
                hotel: { status: 'not_requested' },
                band: { status: 'succeeded', receipt: { slotId: 3, message: 'Slot released' } },
                outcome: { kind: OutcomeKind.SUCCESS, payload: 3 },
            });

            const result = await controller.cancel({ slotId: 3 }, { side: ReservationSide.BAND });

            expect(mockCommandBus.execute).toHaveBeenCalledWith(new CancelSlotCommand(3, ReservationSide.BAND));
            expect(result.success).toBe(true);
            expect(result.data).toBe(3);
        });
    });

    describe('reserveEarliest', () => {
        it('should report an exhausted search', async () => {
            mockCommandBus.execute.mockResolvedValue({ kind: OutcomeKind.EXHAUSTED, attempts: 3, lastFailure: null });

            const result = await controller.reserveEarliest();

            expect(mockCommandBus.execute).toHaveBeenCalledWith(expect.any(ReserveEarliestCommand));
            expect(result).toEqual({ success: false, outcome: OutcomeKind.EXHAUSTED, attempts: 3, failure: undefined });
        });
    });

    describe('cancelAll', () => {
        it('should dispatch CancelAllCommand', async () => {
            mockCommandBus.execute.mockResolvedValue({ kind: OutcomeKind.NO_CANDIDATES });

            const result = await controller.cancelAll();

            expect(mockCommandBus.execute).toHaveBeenCalledWith(expect.any(CancelAllCommand));
            expect(result).toEqual({ success: false, outcome: OutcomeKind.NO_CANDIDATES });
        });
    });
});
