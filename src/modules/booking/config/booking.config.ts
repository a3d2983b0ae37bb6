import { registerAs } from '@nestjs/config';

export type ReservationBackend = 'http' | 'in-memory';

export interface ServiceEndpointSettings {
    url: string;
    token: string;
}

export interface InMemorySettings {
    slotCount: number;
    holdLimit: number;
    /** Share of slots taken by other clients when the in-memory backend starts */
    occupancy: number;
}

export interface BookingSettings {
    backend: ReservationBackend;
    hotel: ServiceEndpointSettings;
    band: ServiceEndpointSettings;
    retries: number;
    delayMs: number;
    timeoutMs: number;
    rateLimitIntervalMs: number;
    earliestMaxAttempts: number;
    earliestBackoffMs: number;
    candidateLimit: number;
    browseLimit: number;
    inMemory: InMemorySettings;
}

const toInt = (value: string | undefined, fallback: number): number => {
    const parsed = parseInt(value ?? '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
};

const toFloat = (value: string | undefined, fallback: number): number => {
    const parsed = parseFloat(value ?? '');
    return Number.isNaN(parsed) ? fallback : parsed;
};

const toBackend = (value: string | undefined): ReservationBackend =>
    value?.trim().toLowerCase() === 'in-memory' ? 'in-memory' : 'http';

export const DEFAULT_BOOKING_SETTINGS: BookingSettings = {
    backend: 'http',
    hotel: { url: '', token: '' },
    band: { url: '', token: '' },
    retries: 3,
    delayMs: 100,
    timeoutMs: 10000,
    rateLimitIntervalMs: 1000,
    earliestMaxAttempts: 3,
    earliestBackoffMs: 1000,
    candidateLimit: 5,
    browseLimit: 20,
    inMemory: { slotCount: 100, holdLimit: 2, occupancy: 0.3 },
};

export const loadBookingSettings = (env: NodeJS.ProcessEnv = process.env): BookingSettings => {
    const defaults = DEFAULT_BOOKING_SETTINGS;
    return {
        backend: toBackend(env.RESERVATION_BACKEND),
        hotel: { url: env.HOTEL_API_URL ?? '', token: env.HOTEL_API_TOKEN ?? '' },
        band: { url: env.BAND_API_URL ?? '', token: env.BAND_API_TOKEN ?? '' },
        retries: Math.max(1, toInt(env.RESERVATION_RETRIES, defaults.retries)),
        delayMs: toInt(env.RESERVATION_DELAY_MS, defaults.delayMs),
        timeoutMs: toInt(env.RESERVATION_TIMEOUT_MS, defaults.timeoutMs),
        rateLimitIntervalMs: toInt(env.RATE_LIMIT_INTERVAL_MS, defaults.rateLimitIntervalMs),
        earliestMaxAttempts: Math.max(1, toInt(env.EARLIEST_MAX_ATTEMPTS, defaults.earliestMaxAttempts)),
        earliestBackoffMs: toInt(env.EARLIEST_BACKOFF_MS, defaults.earliestBackoffMs),
        candidateLimit: toInt(env.CANDIDATE_LIMIT, defaults.candidateLimit),
        browseLimit: toInt(env.BROWSE_LIMIT, defaults.browseLimit),
        inMemory: {
            slotCount: toInt(env.IN_MEMORY_SLOT_COUNT, defaults.inMemory.slotCount),
            holdLimit: toInt(env.IN_MEMORY_HOLD_LIMIT, defaults.inMemory.holdLimit),
            occupancy: toFloat(env.IN_MEMORY_OCCUPANCY, defaults.inMemory.occupancy),
        },
    };
};

export default registerAs('booking', (): BookingSettings => loadBookingSettings());
