import { LoggerService } from '@nestjs/common';
import { Logger } from 'winston';

/**
 * Nest LoggerService backed by a winston instance. Nest passes the context
 * (the class name given to `new Logger(...)`) as the last optional parameter.
 */
export class WinstonLogger implements LoggerService {
    constructor(private readonly logger: Logger) {}

    log(message: unknown, context?: string): void {
        this.logger.info(String(message), { context });
    }

    error(message: unknown, trace?: string, context?: string): void {
        this.logger.error(String(message), { context, trace });
    }

    warn(message: unknown, context?: string): void {
        this.logger.warn(String(message), { context });
    }

    debug(message: unknown, context?: string): void {
        this.logger.debug(String(message), { context });
    }

    verbose(message: unknown, context?: string): void {
        this.logger.verbose(String(message), { context });
    }

    fatal(message: unknown, context?: string): void {
        this.logger.error(String(message), { context, fatal: true });
    }
}
