export enum ReservationErrorKind {
    BAD_REQUEST = 'BadRequest',
    INVALID_TOKEN = 'InvalidToken',
    BAD_SLOT = 'BadSlot',
    NOT_PROCESSED = 'NotProcessed',
    SLOT_UNAVAILABLE = 'SlotUnavailable',
    RESERVATION_LIMIT_EXCEEDED = 'ReservationLimitExceeded',
    UNEXPECTED_STATUS = 'UnexpectedStatus',
    TRANSPORT = 'Transport',
}

/**
 * Base class for every failure a reservation service reports.
 * The coordinator catches these at the call site; anything else is treated as a fault.
 */
export abstract class ReservationServiceError extends Error {
    abstract readonly kind: ReservationErrorKind;

    constructor(message: string, public readonly status?: number) {
        super(message);
        this.name = new.target.name;
    }
}

export class BadRequestError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.BAD_REQUEST;
}

export class InvalidTokenError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.INVALID_TOKEN;
}

export class BadSlotError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.BAD_SLOT;
}

export class NotProcessedError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.NOT_PROCESSED;
}

export class SlotUnavailableError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.SLOT_UNAVAILABLE;
}

export class ReservationLimitError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.RESERVATION_LIMIT_EXCEEDED;
}

export class UnexpectedStatusError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.UNEXPECTED_STATUS;
}

export class TransportError extends ReservationServiceError {
    readonly kind = ReservationErrorKind.TRANSPORT;
}

const ERRORS_BY_STATUS: Readonly<Record<number, new (message: string, status?: number) => ReservationServiceError>> =
    {
        400: BadRequestError,
        401: InvalidTokenError,
        403: BadSlotError,
        404: NotProcessedError,
        409: SlotUnavailableError,
        451: ReservationLimitError,
    };

/**
 * Map a non-retryable HTTP status to its typed error.
 * Statuses without a dedicated meaning become UnexpectedStatusError.
 */
export const errorForStatus = (status: number, reason: string): ReservationServiceError => {
    const ErrorType = ERRORS_BY_STATUS[status];
    if (ErrorType) {
        return new ErrorType(reason, status);
    }
    return new UnexpectedStatusError(`Unexpected status code ${status}: ${reason}`, status);
};

export const isReservationServiceError = (error: unknown): error is ReservationServiceError =>
    error instanceof ReservationServiceError;
