import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
    InconsistentStateDetail,
    OutcomeKind,
    ReservationOutcome,
    ServiceFailure,
    SideResult,
} from '../outcomes/reservation-outcome';
import { DualResult } from '../sagas/dual-reservation.saga';
import { ReservationReceipt } from '../services/reservation-service.interface';

export class BookingResponseDto<T> {
    @ApiProperty({ description: 'True only for a success outcome' })
    success!: boolean;

    @ApiProperty({ enum: OutcomeKind })
    outcome!: OutcomeKind;

    @ApiPropertyOptional({ description: 'Operation payload on success' })
    data?: T;

    @ApiPropertyOptional({ description: 'Failed call: side, operation, slot and error kind' })
    failure?: ServiceFailure;

    @ApiPropertyOptional({ description: 'Set when a compensation failed and the services may disagree' })
    inconsistency?: InconsistentStateDetail;

    @ApiPropertyOptional({ description: 'Attempts used by an exhausted search' })
    attempts?: number;
}

export class DualBookingResponseDto extends BookingResponseDto<number> {
    @ApiProperty({ description: 'Hotel side result' })
    hotel!: SideResult<ReservationReceipt>;

    @ApiProperty({ description: 'Band side result' })
    band!: SideResult<ReservationReceipt>;
}

export const toBookingResponse = <T>(outcome: ReservationOutcome<T>): BookingResponseDto<T> => {
    switch (outcome.kind) {
        case OutcomeKind.SUCCESS:
            return { success: true, outcome: outcome.kind, data: outcome.payload };
        case OutcomeKind.NO_CANDIDATES:
            return { success: false, outcome: outcome.kind };
        case OutcomeKind.SERVICE_FAILURE:
            return { success: false, outcome: outcome.kind, failure: outcome.failure };
        case OutcomeKind.INCONSISTENT_STATE:
            return { success: false, outcome: outcome.kind, inconsistency: outcome.detail };
        case OutcomeKind.EXHAUSTED:
            return {
                success: false,
                outcome: outcome.kind,
                attempts: outcome.attempts,
                failure: outcome.lastFailure ?? undefined,
            };
    }
};

export const toDualBookingResponse = (result: DualResult): DualBookingResponseDto => ({
    ...toBookingResponse(result.outcome),
    hotel: result.hotel,
    band: result.band,
});
