import { SlotId } from '../sagas/reservation-side.enum';

const ascending = (a: SlotId, b: SlotId): number => a - b;

const intersect = (left: Iterable<SlotId>, right: Iterable<SlotId>): Set<SlotId> => {
    const rightSet = new Set(right);
    return new Set([...left].filter(id => rightSet.has(id)));
};

const subtract = (left: Iterable<SlotId>, right: Iterable<SlotId>): Set<SlotId> => {
    const rightSet = new Set(right);
    return new Set([...left].filter(id => !rightSet.has(id)));
};

export const sortSlots = (ids: Iterable<SlotId>): SlotId[] => [...new Set(ids)].sort(ascending);

/**
 * Slots eligible for a new matched-pair attempt, earliest first:
 * available on both sides, or held on one side and available on the other.
 */
export const candidateSet = (
    availableHotel: Iterable<SlotId>,
    availableBand: Iterable<SlotId>,
    heldHotel: Iterable<SlotId>,
    heldBand: Iterable<SlotId>,
): SlotId[] =>
    sortSlots([
        ...intersect(availableHotel, availableBand),
        ...intersect(heldHotel, availableBand),
        ...intersect(heldBand, availableHotel),
    ]);

export const matchedPairs = (heldHotel: Iterable<SlotId>, heldBand: Iterable<SlotId>): Set<SlotId> =>
    intersect(heldHotel, heldBand);

/** Holds on one side with no counterpart on the other, as [hotel only, band only]. */
export const unmatched = (
    heldHotel: Iterable<SlotId>,
    heldBand: Iterable<SlotId>,
): [hotelOnly: Set<SlotId>, bandOnly: Set<SlotId>] => {
    const hotel = [...heldHotel];
    const band = [...heldBand];
    return [subtract(hotel, band), subtract(band, hotel)];
};

export const earliest = (ids: Iterable<SlotId>): SlotId | null => {
    const sorted = sortSlots(ids);
    return sorted.length > 0 ? sorted[0] : null;
};
