import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AxiosResponse, isAxiosError, Method } from 'axios';
import { errorForStatus, TransportError } from '../errors/reservation.errors';
import { SlotId } from '../sagas/reservation-side.enum';
import { IReservationService, ReservationReceipt } from './reservation-service.interface';

export interface HttpReservationOptions {
    name: string;
    baseUrl: string;
    token: string;
    /** Maximum attempts per request */
    retries: number;
    delayMs: number;
    timeoutMs: number;
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/** Parses `[{ id }]`, accepting positive integer ids as numbers or numeric strings. Returns null for anything else. */
export const parseSlotList = (data: unknown): SlotId[] | null => {
    if (!Array.isArray(data)) return null;
    const ids: SlotId[] = [];
    for (const entry of data) {
        if (!isRecord(entry)) return null;
        if (typeof entry.id === 'string' && entry.id.trim() === '') return null;
        const id = typeof entry.id === 'string' ? Number(entry.id) : entry.id;
        if (typeof id !== 'number' || !Number.isInteger(id) || id < 1) return null;
        ids.push(id);
    }
    return ids;
};

/**
 * Reservation service backed by the remote REST API.
 *
 * Server-side errors (5xx), dropped connections, timeouts and unparsable list bodies are
 * retried up to `retries` attempts with `delayMs` between them. Client errors map to the
 * typed errors the coordinator understands and are never retried.
 */
export class HttpReservationService implements IReservationService {
    readonly backend = 'http' as const;
    private readonly logger: Logger;

    constructor(private readonly httpService: HttpService, private readonly options: HttpReservationOptions) {
        this.logger = new Logger(`${HttpReservationService.name}:${options.name}`);
    }

    listAvailable(): Promise<SlotId[]> {
        return this.send('GET', 'reservation/available', parseSlotList);
    }

    listHeld(): Promise<SlotId[]> {
        return this.send('GET', 'reservation', parseSlotList);
    }

    reserve(slotId: SlotId): Promise<ReservationReceipt> {
        return this.send('POST', `reservation/${slotId}`, data => this.toReceipt(slotId, data, 'reserved'));
    }

    release(slotId: SlotId): Promise<ReservationReceipt> {
        return this.send('DELETE', `reservation/${slotId}`, data => this.toReceipt(slotId, data, 'released'));
    }

    private toReceipt(slotId: SlotId, data: unknown, verb: string): ReservationReceipt {
        const message = isRecord(data) && typeof data.message === 'string' ? data.message : `Slot ${verb}`;
        return { slotId, message };
    }

    private resolveUrl(endpoint: string): string {
        const base = this.options.baseUrl.endsWith('/') ? this.options.baseUrl : `${this.options.baseUrl}/`;
        return new URL(endpoint, base).toString();
    }

    private reason(response: AxiosResponse<unknown>): string {
        if (isRecord(response.data) && typeof response.data.message === 'string') {
            return response.data.message;
        }
        return response.statusText;
    }

    private async send<T>(method: Method, endpoint: string, parse: (data: unknown) => T | null): Promise<T> {
        const url = this.resolveUrl(endpoint);
        const { retries, delayMs, timeoutMs, token } = this.options;

        for (let attempt = 1; attempt <= retries; attempt++) {
            try {
                const response = await this.httpService.axiosRef.request<unknown>({
                    method,
                    url,
                    headers: { Authorization: `Bearer ${token}` },
                    timeout: timeoutMs,
                });

                await sleep(delayMs);

                const parsed = parse(response.data);
                if (parsed !== null) {
                    return parsed;
                }
                this.logger.warn(`Unparsable response from ${method} ${url} (attempt ${attempt}/${retries})`);
            } catch (error) {
                if (!isAxiosError(error)) {
                    const message = error instanceof Error ? error.message : String(error);
                    throw new TransportError(`Request error: ${message}`);
                }

                if (error.response) {
                    const status = error.response.status;
                    const reason = this.reason(error.response);
                    if (status < 500 || status >= 600) {
                        throw errorForStatus(status, reason);
                    }
                    this.logger.warn(`Server error: ${reason} (attempt ${attempt}/${retries})`);
                } else if (error.request) {
                    this.logger.warn(`Connection error (attempt ${attempt}/${retries}): ${error.message}`);
                } else {
                    throw new TransportError(`Request error: ${error.message}`);
                }
            }

            if (attempt < retries) {
                await sleep(delayMs);
            }
        }

        throw new TransportError(`${method} ${url} failed after ${retries} attempts`);
    }
}
