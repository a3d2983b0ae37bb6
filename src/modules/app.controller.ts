import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { EnvironmentConfig } from '../config/environment.config';
import { BOOKING_SETTINGS } from './booking/booking.constants';
import { BookingSettings, ReservationBackend } from './booking/config/booking.config';
import { ReservationSide } from './booking/sagas/reservation-side.enum';
import { ReservationCoordinator } from './booking/sagas/reservation-coordinator.service';

export interface AppInfo {
    name: string;
    version: string;
    environment: string;
    configuredBackend: ReservationBackend;
    backends: Record<ReservationSide, ReservationBackend>;
    rateLimitIntervalMs: number;
    timestamp: string;
}

@ApiTags('app')
@Controller()
export class AppController {
    constructor(
        @Inject('ENVIRONMENT_CONFIG') private readonly environmentConfig: EnvironmentConfig,
        @Inject(BOOKING_SETTINGS) private readonly settings: BookingSettings,
        private readonly coordinator: ReservationCoordinator,
    ) {}

    @Get()
    @ApiOperation({ summary: 'Service info and the active reservation backend' })
    @ApiResponse({ status: 200, description: 'Application information' })
    getAppInfo(): AppInfo {
        return {
            name: 'slot-booking-service',
            version: '1.0.0',
            environment: this.environmentConfig.environment,
            configuredBackend: this.settings.backend,
            backends: this.coordinator.activeBackends(),
            rateLimitIntervalMs: this.settings.rateLimitIntervalMs,
            timestamp: new Date().toISOString(),
        };
    }
}
