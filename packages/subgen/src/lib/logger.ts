// subgen/src/lib/logger.ts

import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
    /** Overrides `LOG_LEVEL`. */
    level?: string;
    /** Disable all output (tests). */
    silent?: boolean;
}

/**
 * pino logger. Level from `LOG_LEVEL` (default `info`); `LOG_PRETTY=true`
 * routes output through pino-pretty.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    if (options.silent) return pino({ level: 'silent' });

    const pretty = process.env.LOG_PRETTY === 'true';
    const level = options.level ?? process.env.LOG_LEVEL ?? 'info';

    return pino({
        level,
        transport: pretty
            ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
            : undefined,
    });
}
