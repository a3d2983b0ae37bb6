import { Logger } from '@nestjs/common';
import { BadSlotError, ReservationLimitError, SlotUnavailableError } from '../errors/reservation.errors';
import { SlotId } from '../sagas/reservation-side.enum';
import { IReservationService, ReservationReceipt } from './reservation-service.interface';

export interface InMemoryReservationOptions {
    name: string;
    slotCount: number;
    holdLimit: number;
    /** Slots already taken by other clients */
    takenSlots?: Iterable<SlotId>;
}

/**
 * Reservation service kept entirely in process memory.
 * Mirrors the remote service's rules: bounded slot range, per-client hold limit,
 * idempotent release. Used for demo mode and as the coordinator's test double.
 */
export class InMemoryReservationService implements IReservationService {
    readonly backend = 'in-memory' as const;
    private readonly logger: Logger;
    private readonly taken = new Set<SlotId>();
    private readonly held = new Set<SlotId>();

    constructor(private readonly options: InMemoryReservationOptions) {
        this.logger = new Logger(`${InMemoryReservationService.name}:${options.name}`);
        for (const slotId of options.takenSlots ?? []) {
            this.occupy(slotId);
        }
    }

    /** Build a service with a random share of slots taken by other clients. */
    static withRandomOccupancy(
        options: Omit<InMemoryReservationOptions, 'takenSlots'>,
        occupancy: number,
        random: () => number = Math.random,
    ): InMemoryReservationService {
        const takenSlots: SlotId[] = [];
        for (let slotId = 1; slotId <= options.slotCount; slotId++) {
            if (random() < occupancy) takenSlots.push(slotId);
        }
        return new InMemoryReservationService({ ...options, takenSlots });
    }

    async listAvailable(): Promise<SlotId[]> {
        const available: SlotId[] = [];
        for (let slotId = 1; slotId <= this.options.slotCount; slotId++) {
            if (!this.taken.has(slotId) && !this.held.has(slotId)) available.push(slotId);
        }
        return available;
    }

    async listHeld(): Promise<SlotId[]> {
        return [...this.held].sort((a, b) => a - b);
    }

    async reserve(slotId: SlotId): Promise<ReservationReceipt> {
        this.assertInRange(slotId);

        if (this.held.size >= this.options.holdLimit) {
            throw new ReservationLimitError(`You already have ${this.options.holdLimit} slots`, 451);
        }
        if (this.taken.has(slotId) || this.held.has(slotId)) {
            throw new SlotUnavailableError(`Slot ${slotId} is already taken`, 409);
        }

        this.held.add(slotId);
        this.logger.debug(`Slot ${slotId} reserved`);
        return { slotId, message: 'Slot reserved' };
    }

    async release(slotId: SlotId): Promise<ReservationReceipt> {
        this.assertInRange(slotId);

        if (this.held.delete(slotId)) {
            this.logger.debug(`Slot ${slotId} released`);
        }
        return { slotId, message: 'Slot released' };
    }

    /** Another client takes the slot. */
    occupy(slotId: SlotId): void {
        this.assertInRange(slotId);
        this.taken.add(slotId);
    }

    /** Another client frees the slot. */
    vacate(slotId: SlotId): void {
        this.taken.delete(slotId);
    }

    private assertInRange(slotId: SlotId): void {
        if (!Number.isInteger(slotId) || slotId < 1 || slotId > this.options.slotCount) {
            throw new BadSlotError(`Slot ${slotId} does not exist`, 403);
        }
    }
}
