import { Controller, Delete, Get, HttpCode, HttpStatus, Logger, Param, Post, Query } from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
    CancelAllCommand,
    CancelSlotCommand,
    CancelUnmatchedCommand,
    ReserveEarliestCommand,
    ReserveSlotCommand,
} from '../commands/impl/slot-booking.commands';
import {
    BookingResponseDto,
    DualBookingResponseDto,
    toBookingResponse,
    toDualBookingResponse,
} from '../dto/booking-response.dto';
import { LimitQueryDto, SideQueryDto, SlotParamsDto } from '../dto/slot-request.dto';
import { AvailableSlots, CleanupReport, EarliestReservation, HeldSlots } from '../outcomes/reservation-outcome';
import { GetAvailableSlotsQuery, GetCandidateSlotsQuery, GetHeldSlotsQuery } from '../queries/impl/slot-booking.queries';
import { SlotId } from '../sagas/reservation-side.enum';

@ApiTags('Slot Booking')
@Controller('slots')
export class SlotBookingController {
    private readonly logger = new Logger(SlotBookingController.name);

    constructor(private readonly commandBus: CommandBus, private readonly queryBus: QueryBus) {}

    @Get('held')
    @ApiOperation({ summary: 'Slots currently held on the hotel and band services' })
    @ApiResponse({ status: 200, type: BookingResponseDto })
    async getHeld(): Promise<BookingResponseDto<HeldSlots>> {
        return toBookingResponse(await this.queryBus.execute(new GetHeldSlotsQuery()));
    }

    @Get('candidates')
    @ApiOperation({
        summary: 'Earliest slots that could become a matched pair',
        description: 'Available on both services, or held on one and available on the other.',
    })
    @ApiResponse({ status: 200, type: BookingResponseDto })
    async getCandidates(@Query() query: LimitQueryDto): Promise<BookingResponseDto<SlotId[]>> {
        return toBookingResponse(await this.queryBus.execute(new GetCandidateSlotsQuery(query.limit)));
    }

    @Get('available')
    @ApiOperation({ summary: 'First available slots on each service' })
    @ApiResponse({ status: 200, type: BookingResponseDto })
    async getAvailable(@Query() query: LimitQueryDto): Promise<BookingResponseDto<AvailableSlots>> {
        return toBookingResponse(await this.queryBus.execute(new GetAvailableSlotsQuery(query.limit)));
    }

    @Post(':slotId/reservation')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({
        summary: 'Reserve a slot on both services, or on one',
        description: `
      Reserves hotel first, then band. If band fails the hotel reservation is released.
      A side that already holds the slot is left as it is.
    `,
    })
    @ApiResponse({ status: 200, type: DualBookingResponseDto })
    @ApiResponse({ status: 400, description: 'Invalid slot or side' })
    async reserve(@Param() params: SlotParamsDto, @Query() query: SideQueryDto): Promise<DualBookingResponseDto> {
        this.logger.log(`Received reservation request for slot ${params.slotId} (${query.side ?? 'both'})`);
        const result = await this.commandBus.execute(new ReserveSlotCommand(params.slotId, query.side));
        return toDualBookingResponse(result);
    }

    @Delete(':slotId/reservation')
    @ApiOperation({
        summary: 'Cancel a slot on both services, or on one',
        description: 'Releases hotel first, then band. If band fails the hotel slot is reserved again.',
    })
    @ApiResponse({ status: 200, type: DualBookingResponseDto })
    async cancel(@Param() params: SlotParamsDto, @Query() query: SideQueryDto): Promise<DualBookingResponseDto> {
        this.logger.log(`Received cancellation request for slot ${params.slotId} (${query.side ?? 'both'})`);
        const result = await this.commandBus.execute(new CancelSlotCommand(params.slotId, query.side));
        return toDualBookingResponse(result);
    }

    @Post('earliest')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({
        summary: 'Hold the earliest available matched pair',
        description: 'Replaces a later held pair, then releases unmatched holds. Retried a bounded number of times.',
    })
    @ApiResponse({ status: 200, type: BookingResponseDto })
    async reserveEarliest(): Promise<BookingResponseDto<EarliestReservation>> {
        return toBookingResponse(await this.commandBus.execute(new ReserveEarliestCommand()));
    }

    @Post('cleanup')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Release unmatched holds and every matched pair but the earliest' })
    @ApiResponse({ status: 200, type: BookingResponseDto })
    async cancelUnmatched(): Promise<BookingResponseDto<CleanupReport>> {
        return toBookingResponse(await this.commandBus.execute(new CancelUnmatchedCommand()));
    }

    @Delete()
    @ApiOperation({ summary: 'Release every held slot on both services' })
    @ApiResponse({ status: 200, type: BookingResponseDto })
    async cancelAll(): Promise<BookingResponseDto<CleanupReport>> {
        return toBookingResponse(await this.commandBus.execute(new CancelAllCommand()));
    }
}
