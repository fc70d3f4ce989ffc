/**
 * Logger
 *
 * Winston logger shared by the history engine, the sample stores and the routes.
 * Messages carry a `[Component]` prefix instead of structured metadata.
 *
 * @module server/utils/logger
 */

import * as winston from 'winston';

function resolveLogLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
}

const logger = winston.createLogger({
    level: resolveLogLevel(),
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(({ timestamp, level, message }) =>
            `${String(timestamp)} ${level.toUpperCase()} ${String(message)}`
        )
    ),
    transports: [new winston.transports.Console()],
});

export default logger;
