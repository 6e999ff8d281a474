import { spawn } from "child_process";



export interface CommandResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stderr: string;
}

/**
 * Runs one external command to completion. The exit status is the only
 * success signal the pipeline consumes.
 */
export interface CommandRunner {
    run(argv: string[], options?: { cwd?: string; }): Promise<CommandResult>;
}

const MAX_STDERR_CHARS = 16 * 1024;

export class SpawnCommandRunner implements CommandRunner {

    run(argv: string[], options: { cwd?: string; } = {}): Promise<CommandResult> {
        const [ command, ...args ] = argv;
        if (!command) {
            return Promise.reject(new Error("Cannot run an empty command"));
        }

        return new Promise<CommandResult>((resolve, reject) => {
            const child = spawn(command, args, {
                cwd: options.cwd ?? process.cwd(),
                stdio: [ "ignore", "ignore", "pipe" ],
                env: process.env,
            });

            let stderr = "";
            child.stderr.setEncoding("utf8");
            child.stderr.on("data", (chunk: string) => {
                if (stderr.length < MAX_STDERR_CHARS) stderr += chunk;
            });

            child.on("error", (err) => reject(err));
            child.on("close", (exitCode, signal) => resolve({ exitCode, signal, stderr }));
        });
    }
}
