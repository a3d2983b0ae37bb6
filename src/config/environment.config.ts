// src/config/environment.config.ts
import { ConfigService } from '@nestjs/config';
import { LogLevel } from '@nestjs/common';

export interface EnvironmentConfig {
    isDevelopment: boolean;
    isStaging: boolean;
    isProduction: boolean;
    environment: string;
}

export class EnvironmentConfigFactory {
    static create(configService: ConfigService): EnvironmentConfig {
        const environment = configService.get<string>('NODE_ENV', 'development');

        return {
            isDevelopment: environment === 'development',
            isStaging: environment === 'staging',
            isProduction: environment === 'production',
            environment,
        };
    }

    static getLogLevel(environment: string): LogLevel[] {
        switch (environment) {
            case 'production':
                return ['error', 'warn'];
            case 'staging':
                return ['error', 'warn', 'log'];
            case 'test':
                return ['error'];
            case 'development':
            default:
                return ['error', 'warn', 'log', 'debug', 'verbose'];
        }
    }
}
