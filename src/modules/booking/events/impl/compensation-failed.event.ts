import { InconsistentStateDetail } from '../../outcomes/reservation-outcome';

/**
 * Compensation Failed Event
 * Published when undoing one side of a dual reserve or cancel did not go through,
 * leaving the two services out of step for a slot.
 */
export class CompensationFailedEvent {
    constructor(public readonly detail: InconsistentStateDetail, public readonly timestamp: Date = new Date()) {}
}
