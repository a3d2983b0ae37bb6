import { Inject, Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import { BOOKING_SETTINGS } from '../booking.constants';
import { BookingSettings } from '../config/booking.config';

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Process-wide pacing for every call to the hotel and band services.
 *
 * One instance is shared by all callers. The read-compute-sleep-update sequence runs
 * under a single-slot limiter, so concurrent callers queue up instead of all sleeping
 * the same remaining delay and then firing together. Time is read from the monotonic
 * clock and a single wait never exceeds one interval.
 */
@Injectable()
export class RateLimiterService {
    private readonly logger = new Logger(RateLimiterService.name);
    private readonly lock = pLimit(1);
    private lastRequestAt: number | null = null;

    constructor(@Inject(BOOKING_SETTINGS) private readonly settings: BookingSettings) {}

    get intervalMs(): number {
        return this.settings.rateLimitIntervalMs;
    }

    /** Resolves once a full interval has passed since the previous wait() resolved. */
    wait(): Promise<void> {
        return this.lock(async () => {
            const remaining =
                this.lastRequestAt === null
                    ? 0
                    : Math.min(this.intervalMs, Math.max(0, this.intervalMs - (performance.now() - this.lastRequestAt)));
            if (remaining > 0) {
                this.logger.verbose(`Pacing request, waiting ${remaining}ms`);
                await sleep(remaining);
            }
            this.lastRequestAt = performance.now();
        });
    }

    /** Run a call after its turn in the pacing queue. */
    async schedule<T>(call: () => Promise<T>): Promise<T> {
        await this.wait();
        return call();
    }
}
