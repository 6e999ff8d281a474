// src/pipeline/graph.ts
import { ConfigError, CycleDetectedError } from "../shared/utils/errors.js";
import { FrameNode } from "./nodes/frame-node.js";



type VisitState = "unvisited" | "in-progress" | "done";

/**
 * Nodes keyed by name, with edges derived from each node's input streams.
 * Inputs are referenced by producer name, so nodes may be added in any order.
 */
export class FrameGraph {
    private nodeMap = new Map<string, FrameNode>();
    private validated = false;

    addNode(node: FrameNode): void {
        if (this.nodeMap.has(node.name)) {
            throw new ConfigError(`Node with name "${node.name}" already exists`, { node: node.name });
        }
        this.nodeMap.set(node.name, node);
        this.validated = false;
    }

    getNode(name: string): FrameNode | undefined {
        return this.nodeMap.get(name);
    }

    requireNode(name: string): FrameNode {
        const node = this.nodeMap.get(name);
        if (!node) {
            throw new ConfigError(`Unknown node "${name}"`, { node: name });
        }
        return node;
    }

    nodes(): FrameNode[] {
        return Array.from(this.nodeMap.values());
    }

    dependenciesOf(node: FrameNode): FrameNode[] {
        return node.inputNames.map(name => {
            const input = this.nodeMap.get(name);
            if (!input) {
                throw new ConfigError(`${node.name}: input "${name}" is not produced by any node`, { node: node.name, input: name });
            }
            return input;
        });
    }

    /**
     * Nodes whose output no other node consumes.
     */
    sinks(): FrameNode[] {
        const consumed = new Set(this.nodes().flatMap(node => node.inputNames));
        return this.nodes().filter(node => !consumed.has(node.name));
    }

    /**
     * Checks every input resolves to a node and that the dependency relation is acyclic,
     * then binds each node to its upstream nodes.
     */
    validate(): void {
        const state = new Map<string, VisitState>();
        const path: string[] = [];

        const visit = (node: FrameNode) => {
            const current = state.get(node.name) ?? "unvisited";
            if (current === "done") return;
            if (current === "in-progress") {
                throw new CycleDetectedError([ ...path.slice(path.indexOf(node.name)), node.name ]);
            }

            state.set(node.name, "in-progress");
            path.push(node.name);
            for (const input of this.dependenciesOf(node)) {
                visit(input);
            }
            path.pop();
            state.set(node.name, "done");
        };

        for (const node of this.nodeMap.values()) {
            visit(node);
        }

        for (const node of this.nodeMap.values()) {
            node.bindInputs(this.dependenciesOf(node));
        }
        this.validated = true;
    }

    /**
     * Topological order, inputs before the nodes that consume them.
     */
    evaluationOrder(): FrameNode[] {
        if (!this.validated) this.validate();

        const sorted: FrameNode[] = [];
        const visited = new Set<string>();
        const visit = (node: FrameNode) => {
            if (visited.has(node.name)) return;
            visited.add(node.name);
            for (const input of node.inputs) visit(input);
            sorted.push(node);
        };
        for (const node of this.nodeMap.values()) visit(node);
        return sorted;
    }

    /**
     * Graphviz `digraph` of the graph, or of the part `sinkName` depends on.
     * Edges point from producer to consumer.
     */
    toDot(sinkName?: string): string {
        const order = this.evaluationOrder();
        let included = order;
        if (sinkName !== undefined) {
            const upstream = new Set<string>();
            const collect = (node: FrameNode) => {
                if (upstream.has(node.name)) return;
                upstream.add(node.name);
                node.inputs.forEach(collect);
            };
            collect(this.requireNode(sinkName));
            included = order.filter(node => upstream.has(node.name));
        }

        const quote = (name: string) => `"${name.replace(/"/g, '\\"')}"`;
        const lines = [ "digraph G {" ];
        for (const node of included) {
            lines.push(`  ${quote(node.name)} [label=${quote(`${node.name}\\n${node.kind}`)}];`);
        }
        for (const node of included) {
            for (const input of new Set(node.inputNames)) {
                lines.push(`  ${quote(input)} -> ${quote(node.name)};`);
            }
        }
        lines.push("}");
        return lines.join("\n");
    }

    /**
     * Validates, probes every source stream once, and resolves all frame ranges.
     */
    async prepare(): Promise<void> {
        const order = this.evaluationOrder();
        await Promise.all(order.filter(node => node.isSource).map(node => node.output.availableRange()));
        for (const node of order) {
            const range = node.frameRange();
            console.debug(`[Graph] ${node.name} (${node.kind}) covers [${range.start}, ${range.end})`);
        }
    }
}
