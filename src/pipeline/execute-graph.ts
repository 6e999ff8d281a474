#!/usr/bin/env node
import * as dotenv from "dotenv";
dotenv.config();
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { v7 as uuidv7 } from "uuid";
import { loadAppConfig } from "../shared/config.js";
import { formatLoggers } from "../shared/format-loggers.js";
import { createRunLogger, logger } from "../shared/logger.js";
import { FAILURE_POLICIES, FrameRange, MaterializeReport } from "../shared/types/index.js";
import { extractErrorDetails, extractErrorMessage } from "../shared/utils/errors.js";
import { loadGraphFile } from "./graph-loader.js";
import { ExecutionPlan, Scheduler } from "./scheduler.js";
import { SpawnCommandRunner } from "./services/command-runner.js";
import { FramePool } from "./services/frame-pool.js";
import { LocalFrameStore } from "./services/frame-store.js";



function printPlan(plan: ExecutionPlan) {
    console.log(`Plan for ${plan.sink} [${plan.range.start}, ${plan.range.end}): ${plan.cacheHits} cached`);
    plan.layers.forEach((layer, i) => {
        console.log(`  layer ${i}: ${layer.length} task(s): ${layer.join(" ")}`);
    });
    for (const failure of plan.failures) {
        console.log(`  cannot run ${failure.key}: ${failure.code} (${failure.message})`);
    }
}

function printReport(report: MaterializeReport) {
    console.log("\n" + "=".repeat(60));
    console.log(`${report.ok ? "✅" : "❌"} ${report.sink} [${report.range.start}, ${report.range.end}) in ${report.durationMs}ms`);
    console.log(`   planned ${report.planned}, cached ${report.skipped}, rendered ${report.succeeded}, failed ${report.failed}, cancelled ${report.cancelled}, missing source frames ${report.missingSources}`);
    for (const failure of report.failures.filter(failure => failure.rootCause === failure.key)) {
        console.log(`   ${failure.key}: ${failure.code}: ${failure.message}`);
    }
}

async function main(): Promise<number> {
    const argv = await yargs(hideBin(process.argv))
        .scriptName("framegraph")
        .option("graph", {
            alias: "g",
            type: "string",
            description: "Path to the JSON graph file",
            demandOption: true,
        })
        .option("sink", {
            type: "string",
            description: "Node to materialize (defaults to the graph's sink)",
        })
        .option("start", {
            type: "number",
            description: "First frame to materialize",
        })
        .option("end", {
            type: "number",
            description: "One past the last frame to materialize",
        })
        .option("workers", {
            alias: "j",
            type: "number",
            description: "Concurrent transforms (defaults to FRAMEGRAPH_WORKERS or the CPU count)",
        })
        .option("retries", {
            type: "number",
            description: "Extra attempts for failed transforms",
        })
        .option("on-failure", {
            choices: FAILURE_POLICIES,
            default: "abort" as const,
            description: "Stop at the first failure, or keep going with unaffected frames",
        })
        .option("dot", {
            type: "boolean",
            default: false,
            description: "Print the graph (or the part the sink depends on) in Graphviz dot format and exit",
        })
        .option("dry-run", {
            type: "boolean",
            default: false,
            description: "Print the execution plan without running anything",
        })
        .strict()
        .help()
        .argv;

    const config = loadAppConfig();
    logger.level = config.logLevel;

    const { graph, sink } = await loadGraphFile(argv.graph, new LocalFrameStore());
    const sinkName = argv.sink ?? sink.name;

    if (argv.dot) {
        process.stdout.write(`${graph.toDot(sinkName)}\n`);
        return 0;
    }

    let range: FrameRange | undefined;
    if (argv.start !== undefined || argv.end !== undefined) {
        await graph.prepare();
        const full = graph.requireNode(sinkName).frameRange();
        range = { start: argv.start ?? full.start, end: argv.end ?? full.end };
    }

    const runId = uuidv7();
    const pool = new FramePool(
        { runner: new SpawnCommandRunner(), store: new LocalFrameStore(), tools: config.tools },
        { size: argv.workers ?? config.workers, maxRetries: argv.retries ?? config.maxRetries },
    );
    const scheduler = new Scheduler(graph, pool, { onFailure: argv[ "on-failure" ], runId });

    process.on("SIGINT", () => {
        console.log("Shutting down: cancelling queued frames...");
        pool.close().catch(error => console.error("Error while closing the pool", error));
    });

    try {
        if (argv[ "dry-run" ]) {
            printPlan(await scheduler.plan(sinkName, range));
            return 0;
        }

        const report = await scheduler.materialize(sinkName, range);
        printReport(report);
        createRunLogger({ runId }).info({ metrics: pool.getMetrics(), ok: report.ok }, "Run complete");
        return report.ok ? 0 : 1;
    } finally {
        await pool.close();
    }
}

formatLoggers();
main().then(
    (code) => { process.exitCode = code; },
    (error: unknown) => {
        console.error({ error: extractErrorDetails(error) }, `\n❌ ${extractErrorMessage(error)}`);
        process.exitCode = 1;
    },
);
