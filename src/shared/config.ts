import os from "os";
import { z } from "zod";
import { ConfigError } from "./utils/errors.js";



const optionalInt = (min: number) => z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : Number(value)),
    z.number().int().min(min).optional()
);

const EnvSchema = z.object({
    FRAMEGRAPH_WORKERS: optionalInt(1),
    FRAMEGRAPH_MAX_RETRIES: optionalInt(0),
    IMAGEMAGICK_CONVERT: z.string().min(1).default("convert"),
    IMAGEMAGICK_COMPOSITE: z.string().min(1).default("composite"),
    IMAGEMAGICK_MONTAGE: z.string().min(1).default("montage"),
    LOG_LEVEL: z.enum([ "trace", "debug", "info", "warn", "error", "fatal" ]).default("info"),
});

/**
 * Executables substituted for the {convert}, {composite} and {montage} placeholders.
 */
export interface ToolPaths {
    convert: string;
    composite: string;
    montage: string;
}

export interface AppConfig {
    workers: number;
    maxRetries: number;
    tools: ToolPaths;
    logLevel: z.infer<typeof EnvSchema>[ "LOG_LEVEL" ];
}

export const DEFAULT_TOOLS: ToolPaths = {
    convert: "convert",
    composite: "composite",
    montage: "montage",
};

export function defaultWorkerCount(): number {
    return Math.max(1, os.availableParallelism());
}

/**
 * Reads configuration from the environment. Call `dotenv.config()` first
 * when a .env file should be honoured.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigError(`Invalid environment: ${issues.join("; ")}`, { issues });
    }

    const values = parsed.data;
    return {
        workers: values.FRAMEGRAPH_WORKERS ?? defaultWorkerCount(),
        maxRetries: values.FRAMEGRAPH_MAX_RETRIES ?? 0,
        tools: {
            convert: values.IMAGEMAGICK_CONVERT,
            composite: values.IMAGEMAGICK_COMPOSITE,
            montage: values.IMAGEMAGICK_MONTAGE,
        },
        logLevel: values.LOG_LEVEL,
    };
}
