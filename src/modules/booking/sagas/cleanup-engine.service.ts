import { Injectable, Logger } from '@nestjs/common';
import { earliest, matchedPairs, sortSlots, unmatched } from '../matching/slot-matcher';
import {
    CleanupReport,
    HeldSlots,
    OutcomeKind,
    ReservationOutcome,
    describeFailure,
    failedWith,
    succeeded,
} from '../outcomes/reservation-outcome';
import { ReservationGateway } from '../services/reservation-gateway.service';
import { DualReservationSaga } from './dual-reservation.saga';
import { ReservationSide, SlotId } from './reservation-side.enum';

const emptyReport = (): CleanupReport => ({
    released: { hotel: [], band: [] },
    cancelledPairs: [],
    keptPair: null,
    failures: [],
    inconsistencies: [],
});

/**
 * Cleanup Engine
 *
 * Keeps the held state at "one matched pair at most, no unmatched holds".
 * Every slot is released on its own: one failure is recorded in the report and the
 * sweep carries on.
 */
@Injectable()
export class CleanupEngine {
    private readonly logger = new Logger(CleanupEngine.name);

    constructor(private readonly gateway: ReservationGateway, private readonly dualReservation: DualReservationSaga) {}

    /**
     * Release unmatched holds on both sides, then cancel every matched pair except the
     * earliest. Pass a snapshot taken just before to skip re-reading held slots.
     */
    async cancelAllUnmatched(snapshot?: HeldSlots): Promise<ReservationOutcome<CleanupReport>> {
        let held = snapshot;
        if (!held) {
            const read = await this.gateway.snapshotHeld();
            if (!read.ok) return failedWith(read.failure);
            held = read.value;
        }

        const report = emptyReport();
        const [hotelOnly, bandOnly] = unmatched(held.hotel, held.band);
        await this.releaseEach(ReservationSide.HOTEL, sortSlots(hotelOnly), report);
        await this.releaseEach(ReservationSide.BAND, sortSlots(bandOnly), report);

        const pairs = sortSlots(matchedPairs(held.hotel, held.band));
        report.keptPair = earliest(pairs);

        for (const slotId of pairs.slice(1)) {
            this.logger.log(`Cancelling later matching pair at slot ${slotId}`);
            const { outcome } = await this.dualReservation.cancelBoth(slotId);
            switch (outcome.kind) {
                case OutcomeKind.SUCCESS:
                    report.cancelledPairs.push(slotId);
                    break;
                case OutcomeKind.SERVICE_FAILURE:
                    report.failures.push(outcome.failure);
                    break;
                case OutcomeKind.INCONSISTENT_STATE:
                    report.inconsistencies.push(outcome.detail);
                    break;
                default:
                    break;
            }
        }

        if (report.keptPair !== null) {
            this.logger.log(`Kept earliest matching pair at slot ${report.keptPair}`);
        }
        this.logSummary('Unmatched slots cleanup', report);
        return succeeded(report);
    }

    /** Release every held slot on both sides. */
    async cancelEverything(): Promise<ReservationOutcome<CleanupReport>> {
        const read = await this.gateway.snapshotHeld();
        if (!read.ok) {
            return failedWith(read.failure);
        }
        const held = read.value;

        const report = emptyReport();
        await this.releaseEach(ReservationSide.HOTEL, sortSlots(held.hotel), report);
        await this.releaseEach(ReservationSide.BAND, sortSlots(held.band), report);

        this.logSummary('Cancel all', report);
        return succeeded(report);
    }

    private async releaseEach(side: ReservationSide, slotIds: SlotId[], report: CleanupReport): Promise<void> {
        for (const slotId of slotIds) {
            const result = await this.gateway.release(side, slotId);
            if (result.ok) {
                this.logger.log(`Cancelled ${side} slot ${slotId}`);
                report.released[side === ReservationSide.HOTEL ? 'hotel' : 'band'].push(slotId);
            } else {
                this.logger.warn(`Failed to cancel ${side} slot ${slotId}: ${result.failure.message}`);
                report.failures.push(result.failure);
            }
        }
    }

    private logSummary(operation: string, report: CleanupReport): void {
        if (report.failures.length === 0 && report.inconsistencies.length === 0) {
            this.logger.log(`🧹 ${operation} completed`);
            return;
        }
        this.logger.warn(
            `⚠️ ${operation} completed with ${report.failures.length} failure(s) and ${report.inconsistencies.length} inconsistency(ies)`,
        );
        for (const failure of report.failures) {
            this.logger.warn(`  ${describeFailure(failure)}`);
        }
        for (const detail of report.inconsistencies) {
            this.logger.error(`  ${detail.message}`);
        }
    }
}
