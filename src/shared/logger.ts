import pino from 'pino';
import os from 'os';



export interface LogContext {
    runId: string;
    node?: string;
    frame?: number;
    [ key: string ]: unknown;
}

/** Host and pid of this process; every pool slot logs under the same tag. */
const processTag = `${os.hostname()}-${process.pid}`.toLowerCase();

function timestamps(): string {
    const now = new Date();
    return `,"timestamp_iso":"${now.toISOString()}","timestamp_human":"${now.toLocaleString()}"`;
}

const options: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    base: undefined,
    timestamp: timestamps,
    mixin: () => ({ worker_id: processTag }),
    formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
    },
};

if (process.env.NODE_ENV === 'development') {
    options.transport = {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' },
    };
}

export const logger = pino(options);

/**
 * Creates a scoped logger for a single materialize run.
 * Every line logged through it carries the run id.
 */
export function createRunLogger(context: LogContext) {
    return logger.child(context);
}
