import { GetAvailableSlotsHandler, GetCandidateSlotsHandler, GetHeldSlotsHandler } from './slot-booking.handlers';

export const QueryHandlers = [GetHeldSlotsHandler, GetCandidateSlotsHandler, GetAvailableSlotsHandler];
