import { v7 as uuidv7 } from "uuid";
import { FrameIndex, FrameRange, InputRef, framesOf, inRange } from "../shared/types/frame.types.js";
import {
    FailurePolicy,
    MaterializeReport,
    TaskFailure,
    TaskKey,
    TaskResult,
    TaskState,
    taskKey,
} from "../shared/types/task.types.js";
import {
    MissingInputError,
    OutOfRangeError,
    extractErrorMessage,
    toFailureCode,
} from "../shared/utils/errors.js";
import { logContextStore } from "../shared/format-loggers.js";
import { FrameGraph } from "./graph.js";
import { FrameNode } from "./nodes/frame-node.js";
import { FramePool } from "./services/frame-pool.js";



export interface SchedulerOptions {
    /** `abort` stops dispatching after the first failure; `continue` runs everything unaffected. */
    onFailure?: FailurePolicy;
    /** Identifies the run in logs and the report. Generated per run when omitted. */
    runId?: string;
}

interface TaskEntry {
    key: TaskKey;
    node: FrameNode;
    frame: FrameIndex;
    state: TaskState;
    /** Upstream tasks in the order their outputs are consumed; may repeat. */
    inputs: TaskKey[];
    /** Distinct upstream tasks. */
    deps: TaskKey[];
    dependents: TaskKey[];
    cached: boolean;
    failure?: TaskFailure;
}

type TaskTable = Map<TaskKey, TaskEntry>;

export interface PlannedTask {
    key: TaskKey;
    node: string;
    frame: FrameIndex;
    state: TaskState;
    cached: boolean;
    dependencies: TaskKey[];
}

/**
 * Result of demand resolution, before anything runs.
 */
export interface ExecutionPlan {
    sink: string;
    range: FrameRange;
    tasks: PlannedTask[];
    /** Tasks to run, grouped so every task's dependencies sit in earlier layers. */
    layers: TaskKey[][];
    cacheHits: number;
    failures: TaskFailure[];
}

interface Completion {
    entry: TaskEntry;
    result: TaskResult;
}

/**
 * Lazy pull engine: resolves the frames a sink needs top-down, then executes
 * the resulting per-frame tasks bottom-up through the worker pool.
 * Only the scheduler reads or writes task state.
 */
export class Scheduler {
    private onFailure: FailurePolicy;
    private runId?: string;

    constructor(
        private graph: FrameGraph,
        private pool: FramePool,
        options: SchedulerOptions = {},
    ) {
        this.onFailure = options.onFailure ?? "abort";
        this.runId = options.runId;
    }

    private resolveRange(sink: FrameNode, range?: FrameRange): FrameRange {
        const available = sink.frameRange();
        if (!range) return available;
        if (range.start >= range.end) return range;
        if (!inRange(available, range.start)) throw new OutOfRangeError(sink.name, range.start, available);
        if (!inRange(available, range.end - 1)) throw new OutOfRangeError(sink.name, range.end - 1, available);
        return range;
    }

    private markFailed(entry: TaskEntry, error: unknown, rootCause: TaskKey = entry.key) {
        entry.state = "Failed";
        entry.failure = {
            key: entry.key,
            node: entry.node.name,
            frame: entry.frame,
            code: toFailureCode(error),
            message: extractErrorMessage(error),
            rootCause,
        };
    }

    /**
     * Top-down demand resolution for one (node, frame). Existing outputs are cache hits
     * and stop the descent; the table doubles as the memo for shared dependencies.
     */
    private async resolve(table: TaskTable, node: FrameNode, frame: FrameIndex): Promise<TaskEntry> {
        const key = taskKey(node.name, frame);
        const existing = table.get(key);
        if (existing) return existing;

        const entry: TaskEntry = { key, node, frame, state: "Pending", inputs: [], deps: [], dependents: [], cached: false };
        table.set(key, entry);

        if (await node.output.exists(frame)) {
            entry.state = "Done";
            entry.cached = true;
            return entry;
        }

        if (node.isSource) {
            this.markFailed(entry, MissingInputError.fromMissingSource(node.name, frame, node.output.pathFor(frame)));
            return entry;
        }

        let refs: InputRef[];
        try {
            refs = node.requiredInputs(frame);
        } catch (error) {
            this.markFailed(entry, error);
            return entry;
        }

        for (const ref of refs) {
            const upstream = node.inputs[ ref.input ];
            const dep = await this.resolve(table, upstream, ref.frame);
            entry.inputs.push(dep.key);
            if (!entry.deps.includes(dep.key)) {
                entry.deps.push(dep.key);
                dep.dependents.push(key);
            }
        }
        return entry;
    }

    /**
     * Fails every task downstream of `root` with MissingInput.
     */
    private propagateFailure(table: TaskTable, root: TaskEntry): TaskEntry[] {
        const rootCause = root.failure?.rootCause ?? root.key;
        const affected: TaskEntry[] = [];
        const queue = [ root ];

        while (queue.length > 0) {
            const current = queue.shift();
            if (!current) break;
            for (const dependentKey of current.dependents) {
                const dependent = table.get(dependentKey);
                if (!dependent || dependent.state === "Failed" || dependent.state === "Done") continue;
                this.markFailed(
                    dependent,
                    MissingInputError.fromFailedDependency(dependent.node.name, dependent.frame, current.key),
                    rootCause,
                );
                affected.push(dependent);
                queue.push(dependent);
            }
        }
        return affected;
    }

    private isReady(table: TaskTable, entry: TaskEntry): boolean {
        return entry.state === "Pending" && entry.deps.every(dep => table.get(dep)?.state === "Done");
    }

    private async buildTable(sink: FrameNode, range: FrameRange): Promise<TaskTable> {
        const table: TaskTable = new Map();
        for (const frame of framesOf(range)) {
            await this.resolve(table, sink, frame);
        }

        const roots = Array.from(table.values()).filter(entry => entry.state === "Failed");
        for (const root of roots) {
            this.propagateFailure(table, root);
        }
        return table;
    }

    private computeLayers(table: TaskTable): TaskKey[][] {
        const depth = new Map<TaskKey, number>();
        const layerOf = (entry: TaskEntry): number => {
            const known = depth.get(entry.key);
            if (known !== undefined) return known;

            let layer = 0;
            for (const depKey of entry.deps) {
                const dep = table.get(depKey);
                if (dep && dep.state === "Pending") {
                    layer = Math.max(layer, layerOf(dep) + 1);
                }
            }
            depth.set(entry.key, layer);
            return layer;
        };

        const layers: TaskKey[][] = [];
        for (const entry of table.values()) {
            if (entry.state !== "Pending") continue;
            const layer = layerOf(entry);
            (layers[ layer ] ??= []).push(entry.key);
        }
        return layers;
    }

    private toPlan(sink: FrameNode, range: FrameRange, table: TaskTable): ExecutionPlan {
        const entries = Array.from(table.values());
        return {
            sink: sink.name,
            range,
            tasks: entries.map(entry => ({
                key: entry.key,
                node: entry.node.name,
                frame: entry.frame,
                state: entry.state,
                cached: entry.cached,
                dependencies: [ ...entry.deps ],
            })),
            layers: this.computeLayers(table),
            cacheHits: entries.filter(entry => entry.cached && !entry.node.isSource).length,
            failures: entries.flatMap(entry => (entry.failure ? [ entry.failure ] : [])),
        };
    }

    /**
     * Planning only: which tasks would run for `sink` over `range`, in which order.
     */
    async plan(sinkName: string, range?: FrameRange): Promise<ExecutionPlan> {
        const sink = this.graph.requireNode(sinkName);
        await this.graph.prepare();
        const resolved = this.resolveRange(sink, range);
        return this.toPlan(sink, resolved, await this.buildTable(sink, resolved));
    }

    /**
     * Makes frames `range` (default: all) of `sinkName` exist on disk, producing
     * whatever upstream frames are missing along the way.
     */
    async materialize(sinkName: string, range?: FrameRange): Promise<MaterializeReport> {
        const runId = this.runId ?? uuidv7();
        return logContextStore.run({ runId }, async () => {
            const started = Date.now();
            const sink = this.graph.requireNode(sinkName);
            await this.graph.prepare();
            const resolved = this.resolveRange(sink, range);

            const table = await this.buildTable(sink, resolved);
            const entries = Array.from(table.values()).filter(entry => !entry.node.isSource);
            const planned = entries.length;
            const skipped = entries.filter(entry => entry.cached).length;
            console.log(`[Scheduler] Run ${runId}: ${sink.name} [${resolved.start}, ${resolved.end}) needs ${planned - skipped} of ${planned} frames (${skipped} cached)`);

            const succeeded = await this.execute(table);

            const failures = Array.from(table.values()).flatMap(entry => (entry.failure ? [ entry.failure ] : []));
            const counted = entries.flatMap(entry => (entry.failure ? [ entry.failure ] : []));
            const cancelled = counted.filter(failure => failure.code === "Cancelled").length;
            const report: MaterializeReport = {
                runId,
                sink: sink.name,
                range: resolved,
                planned,
                skipped,
                succeeded,
                failed: counted.length - cancelled,
                cancelled,
                missingSources: failures.length - counted.length,
                failures,
                durationMs: Date.now() - started,
                ok: failures.length === 0,
            };

            if (report.ok) {
                console.log(`[Scheduler] Run ${runId} finished: ${succeeded} rendered, ${skipped} cached`);
            } else {
                console.error({ failed: report.failed, cancelled }, `[Scheduler] Run ${runId} finished with ${report.failed} failed and ${cancelled} cancelled frames`);
            }
            return report;
        });
    }

    /**
     * Bottom-up execution: dispatch every Ready task, and release dependants as
     * results arrive on the completion channel. Returns the number of tasks that succeeded.
     */
    private async execute(table: TaskTable): Promise<number> {
        const completions: Completion[] = [];
        let wake: (() => void) | undefined;
        let inFlight = 0;
        let succeeded = 0;
        let abortCause: TaskKey | undefined;
        let abortReason = "";

        const ready: TaskEntry[] = Array.from(table.values()).filter(entry => this.isReady(table, entry));

        if (this.onFailure === "abort") {
            const planFailure = Array.from(table.values()).find(entry => entry.failure?.rootCause === entry.key);
            if (planFailure) {
                abortCause = planFailure.key;
                abortReason = `${planFailure.key} could not be produced`;
                console.warn(`[Scheduler] ${planFailure.key} cannot be produced; nothing will be dispatched`);
            }
        }

        const dispatch = (entry: TaskEntry) => {
            entry.state = "Dispatched";
            inFlight++;
            const inputPaths = entry.inputs.map(key => {
                const input = table.get(key);
                if (!input) throw new Error(`Task ${entry.key} references unknown input ${key}`);
                return input.node.output.pathFor(input.frame);
            });

            this.pool.submit({ key: entry.key, node: entry.node, frame: entry.frame, inputPaths }).then(
                (result) => {
                    completions.push({ entry, result });
                    wake?.();
                },
                (error: unknown) => {
                    completions.push({
                        entry,
                        result: {
                            ok: false,
                            key: entry.key,
                            node: entry.node.name,
                            frame: entry.frame,
                            code: "TransformFailed",
                            message: extractErrorMessage(error),
                            attempts: 0,
                        },
                    });
                    wake?.();
                },
            );
        };

        for (;;) {
            if (abortCause === undefined) {
                for (const entry of ready.splice(0)) {
                    entry.state = "Ready";
                    dispatch(entry);
                }
            }

            if (inFlight === 0 && completions.length === 0) break;
            if (completions.length === 0) {
                await new Promise<void>(resolve => { wake = resolve; });
                wake = undefined;
            }

            for (const { entry, result } of completions.splice(0)) {
                inFlight--;

                if (result.ok) {
                    entry.state = "Done";
                    succeeded++;
                    for (const dependentKey of entry.dependents) {
                        const dependent = table.get(dependentKey);
                        if (dependent && this.isReady(table, dependent)) ready.push(dependent);
                    }
                    continue;
                }

                if (result.code === "Cancelled") {
                    this.markCancelled(entry, abortCause ?? entry.key, result.message);
                    if (abortCause === undefined) {
                        abortCause = entry.key;
                        abortReason = `${entry.key} was cancelled`;
                        console.warn(`[Scheduler] ${entry.key} was cancelled (${result.message}); nothing more will be dispatched`);
                    }
                    continue;
                }

                console.error({ key: entry.key, code: result.code }, `[Scheduler] ${entry.key} failed: ${result.message}`);
                entry.state = "Failed";
                entry.failure = {
                    key: entry.key,
                    node: entry.node.name,
                    frame: entry.frame,
                    code: result.code,
                    message: result.message,
                    rootCause: entry.key,
                };
                this.propagateFailure(table, entry);

                if (this.onFailure === "abort" && abortCause === undefined) {
                    abortCause = entry.key;
                    abortReason = `${entry.key} failed`;
                    const cancelled = this.pool.cancelQueued(`Run aborted after ${entry.key} failed`);
                    console.warn(`[Scheduler] Aborting after ${entry.key}; ${inFlight - cancelled} in-flight task(s) will finish`);
                }
            }
        }

        if (abortCause !== undefined) {
            for (const entry of table.values()) {
                if (entry.state === "Pending" || entry.state === "Ready") {
                    this.markCancelled(entry, abortCause, `Not started: run aborted after ${abortReason}`);
                }
            }
        }
        return succeeded;
    }

    private markCancelled(entry: TaskEntry, rootCause: TaskKey, message: string) {
        entry.state = "Failed";
        entry.failure = {
            key: entry.key,
            node: entry.node.name,
            frame: entry.frame,
            code: "Cancelled",
            message,
            rootCause,
        };
    }
}
