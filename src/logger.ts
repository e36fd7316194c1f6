import * as winston from 'winston';

const {combine, timestamp, printf, splat} = winston.format;

export interface LogLine {
    timestamp?: unknown;
    level: string;
    message: unknown;
    device?: unknown;
}

/**
 * `<timestamp> <level> [<device>]: <message>`, the device tag only when the entry carries one.
 */
export function formatLogLine(info: LogLine): string {
    const device = info.device === undefined ? '' : ` [${String(info.device)}]`;

    return `${String(info.timestamp)} ${info.level}${device}: ${String(info.message)}`;
}

export const homieLogger = winston.createLogger({
    level: process.env.LOG_LEVEL ?? 'info',
    format: combine(
        splat(),
        timestamp(),
        printf(formatLogLine)
    ),
    transports: [
        new winston.transports.Console({})
    ]
});
