//shared/types/graph-config.types.ts

import { z } from "zod";
import { EDGE_POLICIES } from "./frame.types.js";



// ============================================================================
// OPERATIONS
// ============================================================================

export const GRAVITY_CORNERS = [
    "NorthWest",
    "North",
    "NorthEast",
    "West",
    "Center",
    "East",
    "SouthWest",
    "South",
    "SouthEast",
] as const;

/**
 * Argv template. Placeholders: {input}, {inputN}, {inputs}, {output}, {frame},
 * {convert}, {composite}, {montage}.
 */
export const CommandTemplateSchema = z.array(z.string().min(1)).min(1);
export type CommandTemplate = z.infer<typeof CommandTemplateSchema>;

export const MapOperationSchema = z.discriminatedUnion("type", [
    z.object({ type: z.literal("copy") }),
    z.object({ type: z.literal("format") }),
    z.object({
        type: z.literal("label"),
        text: z.string(),
        corner: z.enum(GRAVITY_CORNERS).default("SouthWest"),
    }),
    z.object({
        type: z.literal("crop"),
        width: z.number().positive().max(100),
        height: z.number().positive().max(100),
        x: z.number().int().nonnegative().default(0),
        y: z.number().int().nonnegative().default(0),
    }),
    z.object({
        type: z.literal("fadeIn"),
        duration: z.number().int().positive().default(24),
        blur: z.boolean().default(false),
    }),
    z.object({
        type: z.literal("fadeOut"),
        duration: z.number().int().positive().default(24),
        blur: z.boolean().default(false),
    }),
    z.object({
        type: z.literal("resize"),
        width: z.number().int().positive(),
        height: z.number().int().positive(),
    }),
    z.object({
        type: z.literal("extent"),
        width: z.number().int().positive(),
        height: z.number().int().positive(),
        /** Shift of the image from the gravity anchor, in pixels; may be negative. */
        x: z.number().int().default(0),
        y: z.number().int().default(0),
        gravity: z.enum(GRAVITY_CORNERS).default("Center"),
        background: z.string().min(1).optional(),
    }),
    z.object({
        type: z.literal("overlay"),
        image: z.string().min(1),
        gravity: z.enum(GRAVITY_CORNERS).optional(),
    }),
    z.object({ type: z.literal("command"), argv: CommandTemplateSchema }),
]);
export type MapOperation = z.infer<typeof MapOperationSchema>;

// ============================================================================
// NODES
// ============================================================================

const nodeName = z.string().min(1).regex(/^[^#\s]+$/, "node names may not contain '#' or whitespace");
const framePath = z.string().min(1);

export const SourceNodeConfigSchema = z.object({
    kind: z.literal("source"),
    name: nodeName,
    path: framePath,
    offset: z.number().int().nonnegative().default(0),
    count: z.number().int().positive().optional(),
});

export const MapNodeConfigSchema = z.object({
    kind: z.literal("map"),
    name: nodeName,
    path: framePath,
    input: nodeName,
    operation: MapOperationSchema.default({ type: "copy" }),
});

export const MergeNodeConfigSchema = z.object({
    kind: z.literal("merge"),
    name: nodeName,
    path: framePath,
    inputs: z.array(nodeName).min(1),
    layout: z.enum([ "horizontal", "tile" ]).default("horizontal"),
    /** Tile grid; only read by the `tile` layout. */
    columns: z.number().int().positive().default(2),
    rows: z.number().int().positive().default(2),
    command: CommandTemplateSchema.optional(),
});

export const WindowNodeConfigSchema = z.object({
    kind: z.literal("window"),
    name: nodeName,
    path: framePath,
    input: nodeName,
    width: z.number().int().positive(),
    edge: z.enum(EDGE_POLICIES).default("clamp"),
    command: CommandTemplateSchema.optional(),
});

export const ResampleNodeConfigSchema = z.object({
    kind: z.literal("resample"),
    name: nodeName,
    path: framePath,
    input: nodeName,
    ratio: z.number().positive(),
    command: CommandTemplateSchema.optional(),
});

export const SubstreamNodeConfigSchema = z.object({
    kind: z.literal("substream"),
    name: nodeName,
    path: framePath,
    input: nodeName,
    first: z.number().int().nonnegative(),
    last: z.number().int().positive(),
});

/** One image file repeated as every frame, e.g. a title card. */
export const StillNodeConfigSchema = z.object({
    kind: z.literal("still"),
    name: nodeName,
    path: framePath,
    image: z.string().min(1),
    count: z.number().int().positive().default(24),
});

/** Freeze frame: every output frame is a copy of input frame `frame`. */
export const HoldNodeConfigSchema = z.object({
    kind: z.literal("hold"),
    name: nodeName,
    path: framePath,
    input: nodeName,
    frame: z.number().int().nonnegative(),
    count: z.number().int().positive().default(24),
});

export const ConcatNodeConfigSchema = z.object({
    kind: z.literal("concat"),
    name: nodeName,
    path: framePath,
    inputs: z.array(nodeName).min(1),
    crossBlend: z.number().int().nonnegative().default(0),
});

export const NodeConfigSchema = z.discriminatedUnion("kind", [
    SourceNodeConfigSchema,
    MapNodeConfigSchema,
    MergeNodeConfigSchema,
    WindowNodeConfigSchema,
    ResampleNodeConfigSchema,
    SubstreamNodeConfigSchema,
    StillNodeConfigSchema,
    HoldNodeConfigSchema,
    ConcatNodeConfigSchema,
]);

export type NodeConfig = z.infer<typeof NodeConfigSchema>;
export type NodeConfigInput = z.input<typeof NodeConfigSchema>;
export type NodeKind = NodeConfig[ "kind" ];
export type NodeConfigOf<K extends NodeKind> = Extract<NodeConfig, { kind: K; }>;

// ============================================================================
// GRAPH FILE
// ============================================================================

export const GraphConfigSchema = z.object({
    sink: nodeName.optional(),
    nodes: z.array(NodeConfigSchema).min(1),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type GraphConfigInput = z.input<typeof GraphConfigSchema>;
