import { LoggerStrategy } from './logger-strategy.enum';

export const DEFAULT_STRATEGY = LoggerStrategy.WINSTON;

/** Accepted LOG_STRATEGY values, aliases included. */
const STRATEGY_MAP: Readonly<Record<string, LoggerStrategy>> = {
    console: LoggerStrategy.CONSOLE,
    stdout: LoggerStrategy.CONSOLE,
    file: LoggerStrategy.FILE,
    winston: LoggerStrategy.WINSTON,
    all: LoggerStrategy.ALL,
    default: LoggerStrategy.ALL,
};

const VALID_STRATEGIES = new Set<string>(Object.values(LoggerStrategy));

/**
 * Converts the LOG_STRATEGY environment variable to a LoggerStrategy.
 * Unknown or missing values fall back to DEFAULT_STRATEGY.
 */
export const getLoggerStrategy = (envStrategy?: string): LoggerStrategy => {
    if (!envStrategy) {
        return DEFAULT_STRATEGY;
    }
    return STRATEGY_MAP[envStrategy.toLowerCase().trim()] ?? DEFAULT_STRATEGY;
};

export const isValidLoggerStrategy = (strategy: string): strategy is LoggerStrategy => VALID_STRATEGIES.has(strategy);
