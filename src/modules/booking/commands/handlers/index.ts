import { ReserveSlotHandler } from './reserve-slot.handler';
import { CancelSlotHandler } from './cancel-slot.handler';
import { ReserveEarliestHandler } from './reserve-earliest.handler';
import { CancelAllHandler, CancelUnmatchedHandler } from './cleanup.handlers';

export const CommandHandlers = [
    ReserveSlotHandler,
    CancelSlotHandler,
    ReserveEarliestHandler,
    CancelUnmatchedHandler,
    CancelAllHandler,
];
