import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import * as winston from 'winston';
import { WinstonLogger } from '../../common/winston.logger';
import { EnvironmentConfigFactory } from '../../config/environment.config';
import { LoggerStrategy } from './logger-strategy.enum';
import { getLoggerStrategy } from './logger.strategy';

const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose'];

/** Nest log level → winston npm level. */
const LEVEL_MAP: Record<LogLevel, string> = {
    verbose: 'silly',
    debug: 'debug',
    log: 'info',
    warn: 'warn',
    error: 'error',
    fatal: 'error',
};

const WINSTON_ORDER = ['silly', 'debug', 'info', 'warn', 'error'];

export class LoggerFactory {
    static getLogLevels(configService: ConfigService): LogLevel[] {
        const environment = configService.get<string>('NODE_ENV', 'development');
        const levels = EnvironmentConfigFactory.getLogLevel(environment);
        return levels.length > 0 ? levels : DEFAULT_LOG_LEVELS;
    }

    /** Most verbose winston level enabled by `logLevels`. */
    static minimumLevel(logLevels: LogLevel[]): string {
        const enabled = new Set(logLevels.map(level => LEVEL_MAP[level]));
        return WINSTON_ORDER.find(level => enabled.has(level)) ?? 'error';
    }

    /** Console-only winston instance used until the application context exists. */
    static createWinstonInstance(logLevels: LogLevel[] = DEFAULT_LOG_LEVELS): winston.Logger {
        const minLevel = LoggerFactory.minimumLevel(logLevels);
        return winston.createLogger({
            level: minLevel,
            levels: winston.config.npm.levels,
            transports: [
                new winston.transports.Console({
                    level: minLevel,
                    format: winston.format.combine(
                        winston.format.timestamp(),
                        winston.format.colorize(),
                        winston.format.simple(),
                    ),
                }),
            ],
        });
    }

    /**
     * Creates the application logger. Without an application context this is a console
     * logger for bootstrap. With one, it wraps the instance LoggerModule configured from
     * LOG_STRATEGY, LOG_LEVEL and NODE_ENV.
     */
    static createLogger(app?: INestApplicationContext): WinstonLogger {
        if (!app) {
            const environment = process.env.NODE_ENV || 'development';
            const logLevels = EnvironmentConfigFactory.getLogLevel(environment);
            return new WinstonLogger(LoggerFactory.createWinstonInstance(logLevels));
        }

        try {
            return new WinstonLogger(app.get<winston.Logger>(WINSTON_MODULE_PROVIDER, { strict: false }));
        } catch (error: unknown) {
            const fallbackLogger = new WinstonLogger(
                LoggerFactory.createWinstonInstance(LoggerFactory.getLogLevels(app.get(ConfigService))),
            );
            const errorMessage = error instanceof Error ? error.message : 'Unknown error';
            fallbackLogger.warn(`LoggerModule is not available: ${errorMessage}. Using console fallback.`);
            return fallbackLogger;
        }
    }

    static createFromEnvironment(app?: INestApplicationContext): WinstonLogger {
        return LoggerFactory.createLogger(app);
    }

    static getCurrentStrategy(): LoggerStrategy {
        return getLoggerStrategy(process.env.LOG_STRATEGY);
    }
}
