import { FrameIndex, FrameRange } from "../../shared/types/frame.types.js";
import { CommandTemplate, MapOperation, NodeConfig } from "../../shared/types/graph-config.types.js";
import { ToolPaths } from "../../shared/config.js";
import { ConfigError } from "../../shared/utils/errors.js";
import { InputStreamInfo, locateConcatFrame } from "./frame-mapping.js";



export interface CommandContext {
    frame: FrameIndex;
    inputPaths: string[];
    outputPath: string;
    tools: ToolPaths;
    ownRange: FrameRange;
    inputs: InputStreamInfo[];
}

const TEMPLATE_TOKEN = /\{(input\d*|inputs|output|frame|convert|composite|montage)\}/g;
const ANY_TOKEN = /\{([^{}]*)\}/g;
const KNOWN_TOKEN = /^(input\d*|inputs|output|frame|convert|composite|montage)$/;

/**
 * Rejects unknown placeholders and {inputN} references beyond `maxInputs`.
 */
export function validateTemplate(node: string, template: CommandTemplate, maxInputs: number): void {
    for (const arg of template) {
        for (const [ , token ] of arg.matchAll(ANY_TOKEN)) {
            if (!KNOWN_TOKEN.test(token)) {
                throw new ConfigError(`${node}: unknown placeholder {${token}} in command template`, { node, token });
            }
            const indexed = /^input(\d+)$/.exec(token);
            if (indexed && Number.parseInt(indexed[ 1 ], 10) >= maxInputs) {
                throw new ConfigError(`${node}: {${token}} exceeds the ${maxInputs} input(s) this node receives`, { node, token });
            }
        }
        if (arg.includes("{inputs}") && arg !== "{inputs}") {
            throw new ConfigError(`${node}: {inputs} must be a whole argument`, { node });
        }
    }
}

/**
 * Substitutes placeholders; `{inputs}` expands into one argument per input path.
 */
export function expandTemplate(template: CommandTemplate, ctx: CommandContext): string[] {
    const argv: string[] = [];
    for (const arg of template) {
        if (arg === "{inputs}") {
            argv.push(...ctx.inputPaths);
            continue;
        }
        argv.push(arg.replace(TEMPLATE_TOKEN, (_, token: string) => {
            switch (token) {
                case "input": return ctx.inputPaths[ 0 ] ?? "";
                case "output": return ctx.outputPath;
                case "frame": return String(ctx.frame);
                case "convert": return ctx.tools.convert;
                case "composite": return ctx.tools.composite;
                case "montage": return ctx.tools.montage;
                default: {
                    const index = Number.parseInt(token.slice("input".length), 10);
                    return ctx.inputPaths[ index ] ?? "";
                }
            }
        }));
    }
    return argv;
}

function copy(ctx: CommandContext): string[] {
    return [ ctx.tools.convert, ctx.inputPaths[ 0 ], ctx.outputPath ];
}

/**
 * Brightness ramp for fades. Frames outside the fade are plain copies.
 */
function fade(operation: Extract<MapOperation, { type: "fadeIn" | "fadeOut"; }>, ctx: CommandContext): string[] {
    const local = ctx.frame - ctx.ownRange.start;
    const length = ctx.ownRange.end - ctx.ownRange.start;
    const start = operation.type === "fadeIn" ? 0 : length - operation.duration;
    if (local < start || local >= start + operation.duration) return copy(ctx);

    const progress = Math.floor((local - start) / operation.duration * 100);
    const brightness = operation.type === "fadeIn" ? progress : 100 - progress;
    const blurAmount = operation.type === "fadeIn" ? 100 - progress : progress;
    const blur = operation.blur ? [ "-blur", `0x${Math.floor(blurAmount / 100 * 16)}` ] : [];

    return [ ctx.tools.convert, ctx.inputPaths[ 0 ], "-modulate", String(brightness), ...blur, ctx.outputPath ];
}

/** Geometry offset with an explicit sign, e.g. `+0` or `-12`. */
function signed(offset: number): string {
    return offset < 0 ? String(offset) : `+${offset}`;
}

function mapArgv(operation: MapOperation, ctx: CommandContext): string[] {
    switch (operation.type) {
        case "copy":
            return copy(ctx);
        case "format":
            return [ ctx.tools.convert, "-define", "png:color-type=2", "-depth", "8", ctx.inputPaths[ 0 ], `PNG24:${ctx.outputPath}` ];
        case "label":
            return [
                ctx.tools.convert, ctx.inputPaths[ 0 ],
                "-fill", "white", "-undercolor", "#00000080", "-pointsize", "24",
                "-gravity", operation.corner, "-annotate", "+0+5", ` ${operation.text} `,
                ctx.outputPath,
            ];
        case "crop":
            return [
                ctx.tools.convert, ctx.inputPaths[ 0 ],
                "-crop", `${operation.width}%x${operation.height}%+${operation.x}+${operation.y}`,
                ctx.outputPath,
            ];
        case "fadeIn":
        case "fadeOut":
            return fade(operation, ctx);
        case "resize":
            return [ ctx.tools.convert, ctx.inputPaths[ 0 ], "-resize", `${operation.width}x${operation.height}`, ctx.outputPath ];
        case "extent":
            return [
                ctx.tools.convert, ctx.inputPaths[ 0 ],
                ...(operation.background ? [ "-background", operation.background ] : []),
                "-gravity", operation.gravity,
                "-extent", `${operation.width}x${operation.height}${signed(operation.x)}${signed(operation.y)}`,
                ctx.outputPath,
            ];
        case "overlay":
            return [
                ctx.tools.composite,
                ...(operation.gravity ? [ "-gravity", operation.gravity ] : []),
                operation.image, ctx.inputPaths[ 0 ],
                ctx.outputPath,
            ];
        case "command":
            return expandTemplate(operation.argv, ctx);
    }
}

/**
 * Full argv for producing one output frame of a non-source node.
 */
export function buildArgv(config: NodeConfig, ctx: CommandContext): string[] {
    switch (config.kind) {
        case "source":
            throw new ConfigError(`${config.name}: source nodes run no command`, { node: config.name });
        case "map":
            return mapArgv(config.operation, ctx);
        case "merge":
            if (config.command) return expandTemplate(config.command, ctx);
            return config.layout === "tile"
                ? [ ctx.tools.montage, ...ctx.inputPaths, "-mode", "Concatenate", "-tile", `${config.columns}x${config.rows}`, ctx.outputPath ]
                : [ ctx.tools.convert, ...ctx.inputPaths, "+append", ctx.outputPath ];
        case "window":
            if (config.command) return expandTemplate(config.command, ctx);
            return [ ctx.tools.convert, ...ctx.inputPaths, "-evaluate-sequence", "mean", ctx.outputPath ];
        case "resample":
            if (config.command) return expandTemplate(config.command, ctx);
            return copy(ctx);
        case "substream":
        case "hold":
            return copy(ctx);
        case "still":
            return [ ctx.tools.convert, "-type", "TrueColor", config.image, ctx.outputPath ];
        case "concat": {
            const location = locateConcatFrame(config, ctx.inputs, ctx.frame);
            if (!location.blend) return copy(ctx);

            const { factor } = location.blend;
            const blur = 1 - Math.abs(factor - 0.5) * 2;
            // composite draws the first image over the second
            return [
                ctx.tools.composite,
                "-blur", `0x${Math.floor(blur * 16)}`,
                "-blend", `${Math.floor(factor * 100)}%`,
                ctx.inputPaths[ 1 ], ctx.inputPaths[ 0 ],
                ctx.outputPath,
            ];
        }
    }
}
