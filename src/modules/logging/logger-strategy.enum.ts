/**
 * Where log records go. `winston` is the console with winston formatting, `all`
 * adds the rotating files.
 */
export enum LoggerStrategy {
    CONSOLE = 'console',
    FILE = 'file',
    WINSTON = 'winston',
    ALL = 'all',
}
