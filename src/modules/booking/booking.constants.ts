export const HOTEL_RESERVATION_SERVICE = 'HOTEL_RESERVATION_SERVICE';
export const BAND_RESERVATION_SERVICE = 'BAND_RESERVATION_SERVICE';
export const BOOKING_SETTINGS = 'BOOKING_SETTINGS';

/** Candidate count used by the earliest-slot search */
export const SEARCH_CANDIDATE_LIMIT = 5;

/** Holding this many slots on one side triggers a cleanup before reserving */
export const CAPACITY_PRESSURE_THRESHOLD = 2;
