export enum ReservationSide {
    HOTEL = 'hotel',
    BAND = 'band',
}

export enum ServiceOperation {
    LIST_AVAILABLE = 'listAvailable',
    LIST_HELD = 'listHeld',
    RESERVE = 'reserve',
    RELEASE = 'release',
}

/** Hotel is always attempted first; compensation targets whichever side succeeded. */
export const SIDE_ORDER: readonly ReservationSide[] = [ReservationSide.HOTEL, ReservationSide.BAND];

export type SlotId = number;
