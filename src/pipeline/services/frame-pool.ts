import { EventEmitter } from 'events';
import { FrameIndex } from '../../shared/types/frame.types.js';
import { TaskKey, TaskResult } from '../../shared/types/task.types.js';
import { extractErrorMessage } from '../../shared/utils/errors.js';
import { defaultWorkerCount } from '../../shared/config.js';
import { ExecutionContext, FrameNode } from '../nodes/frame-node.js';



/**
 * One (node, frame) unit of work with its inputs already resolved to paths.
 */
export interface WorkUnit {
    key: TaskKey;
    node: FrameNode;
    frame: FrameIndex;
    inputPaths: string[];
}

export interface FramePoolConfig {
    /** Number of units executed at once. Defaults to the available parallelism. */
    size?: number;
    /** Extra attempts for TransformFailed results. Defaults to 0. */
    maxRetries?: number;
    initialDelayMs?: number;
    backoffFactor?: number;
}

export interface FramePoolMetrics {
    size: number;
    active: number;
    queued: number;
    completed: number;
    failed: number;
    retried: number;
}

interface QueuedUnit {
    unit: WorkUnit;
    resolve: (result: TaskResult) => void;
}

/*
* Fixed-size pool of execution slots fed from a FIFO queue. Each unit's transform
* runs as its own OS process; slots share nothing but the filesystem, and every
* unit writes only its own output path.
*/
export class FramePool extends EventEmitter {
    private config: Required<FramePoolConfig>;
    private queue: QueuedUnit[] = [];
    private idleSlots: number[];
    private closed = false;

    private metrics: FramePoolMetrics;

    constructor(private ctx: ExecutionContext, config: FramePoolConfig = {}) {
        super();

        this.config = {
            size: defaultWorkerCount(),
            maxRetries: 0,
            initialDelayMs: 1000,
            backoffFactor: 2,
            ...config,
        };
        if (!Number.isInteger(this.config.size) || this.config.size < 1) {
            throw new RangeError(`Pool size must be a positive integer, got ${this.config.size}`);
        }

        this.idleSlots = Array.from({ length: this.config.size }, (_, i) => i);
        this.metrics = {
            size: this.config.size,
            active: 0,
            queued: 0,
            completed: 0,
            failed: 0,
            retried: 0,
        };
    }

    get size(): number {
        return this.config.size;
    }

    /**
     * Queue a unit. The returned promise always resolves, with a failure result when
     * the unit fails or is cancelled before it starts.
     */
    submit(unit: WorkUnit): Promise<TaskResult> {
        if (this.closed) {
            return Promise.resolve(this.cancelled(unit, "Pool is closed"));
        }

        return new Promise<TaskResult>((resolve) => {
            this.queue.push({ unit, resolve });
            this.metrics.queued = this.queue.length;
            this.pump();
        });
    }

    private pump() {
        while (this.idleSlots.length > 0 && this.queue.length > 0) {
            const workerId = this.idleSlots.shift();
            const item = this.queue.shift();
            if (workerId === undefined || !item) break;

            this.metrics.active++;
            this.metrics.queued = this.queue.length;
            this.runOn(workerId, item).catch(error => {
                console.error(`[FramePool] Slot ${workerId} crashed on ${item.unit.key}:`, extractErrorMessage(error));
            });
        }
    }

    private async runOn(workerId: number, item: QueuedUnit) {
        const { unit } = item;
        this.emit('task-start', { key: unit.key, workerId });

        let result: TaskResult;
        try {
            result = { ...await this.executeWithRetry(unit), workerId };
        } catch (error) {
            result = {
                ok: false,
                key: unit.key,
                node: unit.node.name,
                frame: unit.frame,
                code: 'TransformFailed',
                message: extractErrorMessage(error),
                attempts: 1,
                workerId,
            };
        }

        this.metrics.active--;
        if (result.ok) {
            this.metrics.completed++;
            this.emit('task-done', result);
        } else {
            this.metrics.failed++;
            this.emit('task-failed', result);
        }

        item.resolve(result);
        this.idleSlots.push(workerId);
        this.pump();

        if (this.metrics.active === 0 && this.queue.length === 0) {
            this.emit('idle');
        }
    }

    private async executeWithRetry(unit: WorkUnit): Promise<TaskResult> {
        let delay = this.config.initialDelayMs;

        for (let attempt = 1; ; attempt++) {
            const result = await unit.node.execute(unit.frame, unit.inputPaths, this.ctx);
            const retryable = !result.ok && result.code === 'TransformFailed' && attempt <= this.config.maxRetries;
            if (!retryable) {
                return { ...result, attempts: attempt };
            }

            this.metrics.retried++;
            console.warn({ key: unit.key, attempt, maxRetries: this.config.maxRetries }, `[FramePool] ${unit.key} failed, retrying in ${delay}ms`);
            await new Promise(resolve => setTimeout(resolve, delay));
            delay *= this.config.backoffFactor;
        }
    }

    private cancelled(unit: WorkUnit, message: string): TaskResult {
        return {
            ok: false,
            key: unit.key,
            node: unit.node.name,
            frame: unit.frame,
            code: 'Cancelled',
            message,
            attempts: 0,
        };
    }

    /**
     * Resolve every queued (not yet started) unit as Cancelled. In-flight units are untouched.
     */
    cancelQueued(reason = 'Cancelled before start'): number {
        const pending = this.queue.splice(0);
        this.metrics.queued = 0;
        for (const { unit, resolve } of pending) {
            resolve(this.cancelled(unit, reason));
        }
        if (pending.length > 0 && this.metrics.active === 0) {
            this.emit('idle');
        }
        return pending.length;
    }

    getMetrics(): FramePoolMetrics {
        return { ...this.metrics };
    }

    /**
     * Wait for in-flight and queued units to finish.
     */
    drain(): Promise<void> {
        if (this.metrics.active === 0 && this.queue.length === 0) {
            return Promise.resolve();
        }
        return new Promise(resolve => this.once('idle', () => resolve()));
    }

    /**
     * Cancel queued units, wait for in-flight ones, and refuse further submissions.
     */
    async close(): Promise<void> {
        this.closed = true;
        const cancelled = this.cancelQueued('Pool closed');
        if (cancelled > 0) {
            console.info(`[FramePool] Cancelled ${cancelled} queued units`);
        }
        await this.drain();
    }
}
