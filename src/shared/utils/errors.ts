import { FAILURE_CODES, FailureCode } from "../types/task.types.js";



export class FrameGraphError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigError extends FrameGraphError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "ConfigError", context);
    }
}

/**
 * Raised by graph validation when a node transitively depends on its own output.
 * `cycle` lists node names from the first repeated node back to itself.
 */
export class CycleDetectedError extends FrameGraphError {
    constructor(public readonly cycle: string[]) {
        super(`Cycle detected: ${cycle.join(" -> ")}`, "CycleDetected", { cycle });
    }
}

export class OutOfRangeError extends FrameGraphError {
    constructor(
        public readonly stream: string,
        public readonly frame: number,
        public readonly range: { start: number; end: number; },
    ) {
        super(
            `Frame ${frame} is outside ${stream} [${range.start}, ${range.end})`,
            "OutOfRange",
            { stream, frame, range }
        );
    }
}

export class MissingInputError extends FrameGraphError {
    constructor(
        message: string,
        public readonly node: string,
        public readonly frame: number,
        context?: Record<string, unknown>
    ) {
        super(message, "MissingInput", { ...context, node, frame });
    }

    static fromMissingSource(node: string, frame: number, path: string): MissingInputError {
        return new MissingInputError(`Source frame ${frame} of ${node} not found at ${path}`, node, frame, { path });
    }

    static fromFailedDependency(node: string, frame: number, dependency: string): MissingInputError {
        return new MissingInputError(
            `Input ${dependency} of ${node}#${frame} could not be produced`,
            node,
            frame,
            { dependency }
        );
    }
}

export class TransformFailedError extends FrameGraphError {
    constructor(
        message: string,
        public readonly node: string,
        public readonly frame: number,
        context?: Record<string, unknown>
    ) {
        super(message, "TransformFailed", { ...context, node, frame });
    }

    static fromExitCode(node: string, frame: number, exitCode: number | null, stderr: string): TransformFailedError {
        const tail = stderr.trim().split("\n").slice(-3).join(" | ");
        return new TransformFailedError(
            `Command for ${node}#${frame} exited with code ${exitCode}${tail ? `: ${tail}` : ""}`,
            node,
            frame,
            { exitCode }
        );
    }

    static fromMissingOutput(node: string, frame: number, path: string): TransformFailedError {
        return new TransformFailedError(
            `Command for ${node}#${frame} reported success but wrote no output at ${path}`,
            node,
            frame,
            { path }
        );
    }

    static fromSpawn(node: string, frame: number, error: unknown): TransformFailedError {
        return new TransformFailedError(
            `Command for ${node}#${frame} could not be started: ${extractErrorMessage(error)}`,
            node,
            frame,
        );
    }
}

export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.toString();
    }

    if (error && typeof error === 'object') {
        if ('message' in error && typeof error.message === 'string') {
            return error.message;
        }

        try {
            return JSON.stringify(error);
        } catch {
            return String(error);
        }
    }

    return String(error);
}

/**
 * Extract structured error details
 */
export function extractErrorDetails(error: unknown): Record<string, unknown> | undefined {
    if (!error || typeof error !== 'object') {
        return undefined;
    }

    const details: Record<string, unknown> = {};

    if (error instanceof Error) {
        details.name = error.name;
        details.message = error.message;
        if (error.stack) details.stack = error.stack;
    }

    if (error instanceof FrameGraphError) {
        details.code = error.code;
        if (error.context) details.context = error.context;
    } else if ('code' in error) {
        details.code = error.code;
    }

    return Object.keys(details).length > 0 ? details : undefined;
}

/**
 * Maps any thrown value onto the task failure taxonomy.
 * Unknown errors count as transform failures.
 */
export function toFailureCode(error: unknown): FailureCode {
    if (error instanceof FrameGraphError) {
        const match = FAILURE_CODES.find(code => code === error.code);
        if (match) return match;
    }
    return "TransformFailed";
}
