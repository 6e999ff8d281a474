import * as fs from "node:fs/promises";
import * as path from "node:path";
import { GraphConfig, GraphConfigSchema, NodeConfig } from "../shared/types/graph-config.types.js";
import { ConfigError, extractErrorMessage } from "../shared/utils/errors.js";
import { FrameGraph } from "./graph.js";
import { FrameNode } from "./nodes/frame-node.js";
import { FrameStore, LocalFrameStore } from "./services/frame-store.js";



export interface LoadedGraph {
    graph: FrameGraph;
    /** Explicit `sink` from the file, or the only node nothing consumes. */
    sink: FrameNode;
}

/**
 * Frame templates and image files named by a node, resolved against `baseDir`.
 */
function resolvePaths(node: NodeConfig, baseDir: string): NodeConfig {
    const resolved = { ...node, path: path.resolve(baseDir, node.path) };
    switch (resolved.kind) {
        case "still":
            return { ...resolved, image: path.resolve(baseDir, resolved.image) };
        case "map": {
            const operation = resolved.operation;
            if (operation.type !== "overlay") return resolved;
            return { ...resolved, operation: { ...operation, image: path.resolve(baseDir, operation.image) } };
        }
        default:
            return resolved;
    }
}

/**
 * Builds and validates a graph from an already-parsed configuration object.
 * Relative frame and image paths resolve against `baseDir`.
 */
export function buildGraph(raw: unknown, store: FrameStore, baseDir = process.cwd()): LoadedGraph {
    const parsed = GraphConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
        throw new ConfigError(`Invalid graph: ${issues.join("; ")}`, { issues });
    }
    const config: GraphConfig = parsed.data;

    const graph = new FrameGraph();
    for (const node of config.nodes) {
        graph.addNode(new FrameNode(resolvePaths(node, baseDir), store));
    }
    graph.validate();

    if (config.sink) {
        return { graph, sink: graph.requireNode(config.sink) };
    }

    const sinks = graph.sinks();
    if (sinks.length !== 1) {
        throw new ConfigError(
            `Graph has ${sinks.length} sinks (${sinks.map(node => node.name).join(", ")}); name one with "sink"`,
            { sinks: sinks.map(node => node.name) }
        );
    }
    return { graph, sink: sinks[ 0 ] };
}

/**
 * Reads a JSON graph file. Paths in it are relative to the file's directory.
 */
export async function loadGraphFile(filePath: string, store: FrameStore = new LocalFrameStore()): Promise<LoadedGraph> {
    let raw: unknown;
    try {
        raw = JSON.parse(await fs.readFile(filePath, "utf8"));
    } catch (error) {
        throw new ConfigError(`Could not read graph file ${filePath}: ${extractErrorMessage(error)}`, { filePath });
    }
    console.info(`[GraphLoader] Loaded ${filePath}`);
    return buildGraph(raw, store, path.dirname(path.resolve(filePath)));
}
