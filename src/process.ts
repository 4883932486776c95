import { spawn } from "node:child_process";

export interface ToolRunOptions {
	cwd?: string;
	/** Discard the tool's stdout (errors still reach stderr) */
	quiet?: boolean;
}

/**
 * Run an external tool to completion and resolve with its exit code.
 * A tool that cannot be started resolves with -1.
 */
export type ToolRunner = (
	command: string,
	args: readonly string[],
	options?: ToolRunOptions,
) => Promise<number>;

/**
 * Spawn a tool with an argument vector (no shell), waiting without timeout.
 */
export const runTool: ToolRunner = (command, args, options = {}) =>
	new Promise((resolve) => {
		if (process.env.VCPKG_EXPORT_DEBUG) {
			console.log(`[exec] ${command} ${args.join(" ")}`);
		}

		const child = spawn(command, [...args], {
			cwd: options.cwd,
			shell: false,
			stdio: ["ignore", options.quiet ? "ignore" : "inherit", "inherit"],
		});

		child.once("error", (error) => {
			console.error(`Error: Could not run ${command}: ${error.message}`);
			resolve(-1);
		});
		child.once("close", (code, signal) => {
			if (signal) {
				console.error(`Error: ${command} was terminated by ${signal}`);
			}
			resolve(code ?? -1);
		});
	});
