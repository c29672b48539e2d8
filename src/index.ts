#!/usr/bin/env node
import { Command } from "commander";
import { runStatus } from "./commands/status";
import { loadConfig } from "./lib/config";
import { debugLog, enableDebug, errorLog, formatDuration, getGitCallCount, isDebug, setLogLevel, warnLog } from "./lib/debug";
import { describeError } from "./lib/errors";
import { error } from "./lib/output";
import { setLogStyle } from "./lib/tty";
import { readVersion } from "./version";

const config = loadConfig();
setLogLevel(config.logLevel);
setLogStyle(config.logStyle);
for (const warning of config.warnings) {
	warnLog(warning);
}

const program = new Command();
program
	.name("git-prompt-status")
	.description("Print a one-line summary of a git working tree for use in a shell prompt.")
	.version(readVersion(), "-V, --version")
	.option("--git-dir <dir>", "git directory to analyze", ".")
	.option("--color", "enable color")
	.option("--zsh", "enable zsh encoded color")
	.option("--debug", "enable debug output")
	.configureOutput({
		outputError: (str) => {
			error(str.replace(/^error: /, "").trimEnd());
		},
	})
	.action(async (options: { gitDir: string; color?: boolean; zsh?: boolean; debug?: boolean }) => {
		if (options.debug) enableDebug();
		await runStatus(options);
	});

const commandStart = performance.now();

function printDebugSummary(): void {
	if (!isDebug()) return;
	const count = getGitCallCount();
	debugLog(`${count} git ${count === 1 ? "call" : "calls"} in ${formatDuration(performance.now() - commandStart)}`);
}

async function main(): Promise<void> {
	try {
		await program.parseAsync();
	} catch (err) {
		// The prompt must keep rendering, so even unexpected failures exit 0
		errorLog(describeError(err));
	}
	printDebugSummary();
}

main().catch((err: unknown) => {
	process.stderr.write(`${describeError(err)}\n`);
});
