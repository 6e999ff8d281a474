//shared/types/task.types.ts

import { FrameIndex } from "./frame.types.js";



// ============================================================================
// TASK PROPERTIES
// ============================================================================

export const TASK_STATES = [
    "NotNeeded",
    "Pending",
    "Ready",
    "Dispatched",
    "Done",
    "Failed",
] as const;
export type TaskState = (typeof TASK_STATES)[ number ];

export const FAILURE_CODES = [
    "MissingInput",
    "OutOfRange",
    "TransformFailed",
    "Cancelled",
] as const;
export type FailureCode = (typeof FAILURE_CODES)[ number ];

export const FAILURE_POLICIES = [ "abort", "continue" ] as const;
export type FailurePolicy = (typeof FAILURE_POLICIES)[ number ];

/**
 * Stable address of a (node, frame) pair, e.g. `blend#12`.
 */
export type TaskKey = `${string}#${number}`;

export function taskKey(node: string, frame: FrameIndex): TaskKey {
    return `${node}#${frame}`;
}

// ============================================================================
// TASK RESULTS
// ============================================================================

type TaskResultBase = {
    key: TaskKey;
    node: string;
    frame: FrameIndex;
    workerId?: number;
    attempts: number;
};

export type TaskSuccess = TaskResultBase & {
    ok: true;
    outputPath: string;
};

export type TaskFailureResult = TaskResultBase & {
    ok: false;
    code: FailureCode;
    message: string;
};

export type TaskResult = TaskSuccess | TaskFailureResult;

/**
 * A (node, frame) that could not be completed, with the task that caused it.
 * `rootCause` equals `key` for tasks that failed on their own.
 */
export interface TaskFailure {
    key: TaskKey;
    node: string;
    frame: FrameIndex;
    code: FailureCode;
    message: string;
    rootCause: TaskKey;
}

export interface MaterializeReport {
    runId: string;
    sink: string;
    range: { start: FrameIndex; end: FrameIndex; };
    planned: number;
    skipped: number;
    succeeded: number;
    failed: number;
    cancelled: number;
    /** Source frames the run needed but did not find; not part of `planned`. */
    missingSources: number;
    failures: TaskFailure[];
    durationMs: number;
    ok: boolean;
}
