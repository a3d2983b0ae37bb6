export { LoggerModule } from './logger.module';
export { LoggerConfigService, SERVICE_NAME } from './logger-config.service';
export { LoggerFactory } from './logger.factory';
export { LoggerStrategy } from './logger-strategy.enum';
export { getLoggerStrategy, isValidLoggerStrategy } from './logger.strategy';
