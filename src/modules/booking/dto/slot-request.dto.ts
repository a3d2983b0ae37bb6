import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { ReservationSide } from '../sagas/reservation-side.enum';

export class SlotParamsDto {
    @ApiProperty({ description: 'Slot number; lower is earlier', example: 7 })
    @Type(() => Number)
    @IsInt()
    @Min(1)
    slotId!: number;
}

export class SideQueryDto {
    @ApiPropertyOptional({ enum: ReservationSide, description: 'Only act on this service; both when omitted' })
    @IsOptional()
    @IsEnum(ReservationSide)
    side?: ReservationSide;
}

export class LimitQueryDto {
    @ApiPropertyOptional({ description: 'Maximum number of slots to return', minimum: 1, maximum: 100 })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    @Max(100)
    limit?: number;
}
