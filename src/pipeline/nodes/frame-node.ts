import path from "path";
import { ToolPaths } from "../../shared/config.js";
import { FrameIndex, FrameRange, InputRef } from "../../shared/types/frame.types.js";
import { NodeConfig, NodeConfigInput, NodeConfigSchema, NodeKind } from "../../shared/types/graph-config.types.js";
import { TaskFailureResult, TaskResult, taskKey } from "../../shared/types/task.types.js";
import {
    ConfigError,
    MissingInputError,
    TransformFailedError,
    extractErrorMessage,
    toFailureCode,
} from "../../shared/utils/errors.js";
import { FramePathTemplate } from "../frame-path.js";
import { CommandResult, CommandRunner } from "../services/command-runner.js";
import { FrameStore } from "../services/frame-store.js";
import { Stream } from "../stream.js";
import { InputStreamInfo, deriveRange, requiredInputs } from "./frame-mapping.js";
import { buildArgv, validateTemplate } from "./operations.js";



/**
 * Collaborators a node needs to produce a frame. Owned by the worker pool.
 */
export interface ExecutionContext {
    runner: CommandRunner;
    store: FrameStore;
    tools: ToolPaths;
}

function inputNamesOf(config: NodeConfig): string[] {
    switch (config.kind) {
        case "source":
        case "still":
            return [];
        case "merge":
        case "concat":
            return config.inputs;
        default:
            return [ config.input ];
    }
}

function validateConfig(config: NodeConfig): void {
    switch (config.kind) {
        case "map":
            if (config.operation.type === "command") validateTemplate(config.name, config.operation.argv, 1);
            break;
        case "merge":
            if (config.layout === "tile" && config.inputs.length > config.columns * config.rows) {
                throw new ConfigError(
                    `${config.name}: a ${config.columns}x${config.rows} tile takes at most ${config.columns * config.rows} inputs`,
                    { node: config.name }
                );
            }
            if (config.command) validateTemplate(config.name, config.command, config.inputs.length);
            break;
        case "window":
            if (config.command) validateTemplate(config.name, config.command, config.width);
            break;
        case "resample":
            if (config.command) validateTemplate(config.name, config.command, 1);
            break;
        case "substream":
            if (config.last <= config.first) {
                throw new ConfigError(`${config.name}: last must be greater than first`, { node: config.name });
            }
            break;
        default:
            break;
    }
}

/**
 * A graph vertex: zero or more input streams, one output stream, and a
 * per-frame operation selected by `kind`.
 */
export class FrameNode {
    readonly name: string;
    readonly kind: NodeKind;
    readonly inputNames: readonly string[];
    readonly output: Stream;
    private inputNodes: FrameNode[] = [];
    private cachedRange?: FrameRange;

    constructor(readonly config: NodeConfig, store: FrameStore) {
        validateConfig(config);
        this.name = config.name;
        this.kind = config.kind;
        this.inputNames = inputNamesOf(config);
        this.output = new Stream(
            config.name,
            new FramePathTemplate(config.path),
            store,
            config.kind === "source" ? { offset: config.offset, count: config.count } : {},
        );
    }

    /**
     * Parses raw configuration (applying defaults) before constructing the node.
     */
    static fromConfig(raw: NodeConfigInput, store: FrameStore): FrameNode {
        const parsed = NodeConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
            throw new ConfigError(`Invalid node "${String(raw.name)}": ${issues.join("; ")}`, { issues });
        }
        return new FrameNode(parsed.data, store);
    }

    get isSource(): boolean {
        return this.kind === "source";
    }

    /** Upstream nodes in input order; bound by the graph. */
    get inputs(): readonly FrameNode[] {
        return this.inputNodes;
    }

    bindInputs(nodes: FrameNode[]): void {
        if (nodes.length !== this.inputNames.length) {
            throw new ConfigError(`${this.name}: expected ${this.inputNames.length} inputs, got ${nodes.length}`, { node: this.name });
        }
        this.inputNodes = nodes;
        this.cachedRange = undefined;
    }

    private inputInfo(): InputStreamInfo[] {
        return this.inputNodes.map(node => ({ name: node.name, range: node.frameRange() }));
    }

    /**
     * Valid output range. Sources must have been probed (or declare a count).
     */
    frameRange(): FrameRange {
        if (!this.cachedRange) {
            this.cachedRange = deriveRange(this.config, this.inputInfo(), this.output.knownRange());
        }
        return this.cachedRange;
    }

    requiredInputs(frame: FrameIndex): InputRef[] {
        return requiredInputs(this.config, frame, this.inputInfo(), this.frameRange());
    }

    private fail(frame: FrameIndex, error: unknown): TaskFailureResult {
        return {
            ok: false,
            key: taskKey(this.name, frame),
            node: this.name,
            frame,
            code: toFailureCode(error),
            message: extractErrorMessage(error),
            attempts: 1,
        };
    }

    private async discardPartial(store: FrameStore, outputPath: string): Promise<void> {
        try {
            await store.remove(outputPath);
        } catch (error) {
            console.warn(`[FrameNode] Could not remove partial output ${outputPath}:`, extractErrorMessage(error));
        }
    }

    /**
     * Produces one output frame from already-materialized input paths.
     * Never throws: every failure comes back as a TaskResult.
     */
    async execute(frame: FrameIndex, inputPaths: string[], ctx: ExecutionContext): Promise<TaskResult> {
        const outputPath = this.output.pathFor(frame);
        const success: TaskResult = { ok: true, key: taskKey(this.name, frame), node: this.name, frame, outputPath, attempts: 1 };

        try {
            if (this.isSource) {
                return await ctx.store.exists(outputPath)
                    ? success
                    : this.fail(frame, MissingInputError.fromMissingSource(this.name, frame, outputPath));
            }

            const argv = buildArgv(this.config, {
                frame,
                inputPaths,
                outputPath,
                tools: ctx.tools,
                ownRange: this.frameRange(),
                inputs: this.inputInfo(),
            });
            await ctx.store.ensureDirectory(path.dirname(outputPath));

            let result: CommandResult;
            try {
                result = await ctx.runner.run(argv);
            } catch (error) {
                await this.discardPartial(ctx.store, outputPath);
                return this.fail(frame, TransformFailedError.fromSpawn(this.name, frame, error));
            }

            if (result.exitCode !== 0) {
                await this.discardPartial(ctx.store, outputPath);
                return this.fail(frame, TransformFailedError.fromExitCode(this.name, frame, result.exitCode, result.stderr));
            }

            if (!await ctx.store.exists(outputPath)) {
                await this.discardPartial(ctx.store, outputPath);
                return this.fail(frame, TransformFailedError.fromMissingOutput(this.name, frame, outputPath));
            }
            return success;
        } catch (error) {
            return this.fail(frame, error);
        }
    }
}
