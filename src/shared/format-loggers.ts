import { logger, LogContext } from './logger.js';
import { format } from 'util';
import { AsyncLocalStorage } from 'async_hooks';



export type { LogContext };
export const logContextStore = new AsyncLocalStorage<LogContext>();

type ConsoleLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Routes console output through pino, merging the active log context
 * and the first object argument into the structured record.
 */
export function formatLoggers(
    store: { getStore: () => LogContext | undefined; } = logContextStore,
) {
    const handleIntercept = (level: ConsoleLevel, args: unknown[]) => {
        const context = store.getStore();

        // Human-readable message (handles %s, %d, etc.)
        const message = format(...args);

        const objectArgs = args.find((arg): arg is Record<string, unknown> =>
            typeof arg === 'object' && arg !== null && !(arg instanceof Error)
        ) || {};
        const err = args.find((arg): arg is Error => arg instanceof Error);

        logger[ level ]({ ...context, ...objectArgs, ...(err ? { err } : {}) }, message);
    };

    console.debug = (...args) => handleIntercept('debug', args);
    console.log = (...args) => handleIntercept('info', args);
    console.info = (...args) => handleIntercept('info', args);
    console.warn = (...args) => handleIntercept('warn', args);
    console.error = (...args) => handleIntercept('error', args);
}
