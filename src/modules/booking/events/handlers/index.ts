import { CompensationFailedHandler } from './compensation-failed.handler';

export const EventHandlers = [CompensationFailedHandler];
