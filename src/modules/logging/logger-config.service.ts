import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModuleOptionsFactory, WinstonModuleOptions } from 'nest-winston';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as os from 'os';
import { LoggerStrategy } from './logger-strategy.enum';
import { getLoggerStrategy } from './logger.strategy';

export const SERVICE_NAME = 'slot-booking-service';

interface TransportConfig {
    environment: string;
    isProduction: boolean;
    platform: NodeJS.Platform;
    logStrategy: LoggerStrategy;
    logLevel: string;
}

@Injectable()
export class LoggerConfigService implements WinstonModuleOptionsFactory {
    constructor(private readonly configService: ConfigService) {}

    /**
     * Builds the WinstonModule options from NODE_ENV, LOG_LEVEL and LOG_STRATEGY.
     */
    createWinstonModuleOptions(): WinstonModuleOptions {
        const environment = this.configService.get<string>('NODE_ENV') || 'development';
        const isProduction = environment === 'production';
        const platform = os.platform();
        const logStrategy = getLoggerStrategy(this.configService.get<string>('LOG_STRATEGY'));
        const logLevel = this.getLogLevel(isProduction);

        return {
            level: logLevel,
            transports: this.createTransports({ environment, isProduction, platform, logStrategy, logLevel }),
            exitOnError: false,
            defaultMeta: {
                service: SERVICE_NAME,
                environment,
                platform,
                hostname: os.hostname(),
                pid: process.pid,
            },
        };
    }

    private getLogLevel(isProduction: boolean): string {
        return this.configService.get<string>('LOG_LEVEL') || (isProduction ? 'info' : 'debug');
    }

    createTransports(config: TransportConfig): winston.transport[] {
        const transports: winston.transport[] = [];

        switch (config.logStrategy) {
            case LoggerStrategy.FILE:
                this.addFileTransports(transports, config);
                break;
            case LoggerStrategy.CONSOLE:
            case LoggerStrategy.WINSTON:
                this.addConsoleTransport(transports, config);
                break;
            case LoggerStrategy.ALL:
            default:
                this.addFileTransports(transports, config);
                this.addConsoleTransport(transports, config);
                break;
        }

        return transports;
    }

    private addFileTransports(transports: winston.transport[], config: TransportConfig): void {
        const logDir = this.configService.get<string>('LOG_DIR') || 'logs';
        const fileTransportOptions = {
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json(),
            ),
        };

        transports.push(
            new DailyRotateFile({
                ...fileTransportOptions,
                level: config.logLevel,
                filename: `${logDir}/reservations-%DATE%.log`,
                maxFiles: config.isProduction ? '30d' : '7d',
            }),
            new DailyRotateFile({
                ...fileTransportOptions,
                level: 'error',
                filename: `${logDir}/reservations-error-%DATE%.log`,
                maxFiles: config.isProduction ? '90d' : '14d',
            }),
        );
    }

    private addConsoleTransport(transports: winston.transport[], config: TransportConfig): void {
        const format = config.isProduction
            ? winston.format.combine(
                  winston.format.timestamp(),
                  winston.format.errors({ stack: true }),
                  winston.format.json(),
              )
            : winston.format.combine(
                  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                  winston.format.errors({ stack: true }),
                  winston.format.colorize(),
                  winston.format.printf(({ timestamp, level, message, context }) => {
                      const scope = typeof context === 'string' ? ` [${context}]` : '';
                      return `${String(timestamp)} [${level}]${scope}: ${String(message)}`;
                  }),
              );

        transports.push(
            new winston.transports.Console({
                level: config.logLevel,
                format,
                handleExceptions: true,
                handleRejections: true,
            }),
        );
    }
}
