import { dim, red, yellow } from "./output";

export const LOG_LEVELS = ["off", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let level: LogLevel = "info";
let gitCallCount = 0;

export function setLogLevel(next: LogLevel): void {
	level = next;
}

export function isEnabled(at: Exclude<LogLevel, "off">): boolean {
	return LOG_LEVELS.indexOf(at) <= LOG_LEVELS.indexOf(level);
}

/** Raise verbosity to at least `debug`. Never lowers an already higher level. */
export function enableDebug(): void {
	if (!isEnabled("debug")) level = "debug";
}

export function isDebug(): boolean {
	return isEnabled("debug");
}

export function errorLog(message: string): void {
	if (!isEnabled("error")) return;
	process.stderr.write(`${red("[error]")} ${message}\n`);
}

export function warnLog(message: string): void {
	if (!isEnabled("warn")) return;
	process.stderr.write(`${yellow("[warn]")} ${message}\n`);
}

export function debugLog(message: string): void {
	if (!isEnabled("debug")) return;
	process.stderr.write(`${dim("[debug]")} ${message}\n`);
}

export function traceLog(message: string): void {
	if (!isEnabled("trace")) return;
	process.stderr.write(`${dim("[trace]")} ${message}\n`);
}

export function debugGit(command: string, durationMs: number, exitCode: number): void {
	gitCallCount++;
	if (!isEnabled("trace")) return;
	const suffix =
		exitCode === 0
			? dim(`(${formatDuration(durationMs)}, exit ${exitCode})`)
			: red(`(${formatDuration(durationMs)}, exit ${exitCode})`);
	process.stderr.write(`${dim("[git]")} ${command}  ${suffix}\n`);
}

export function getGitCallCount(): number {
	return gitCallCount;
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)} ms`;
	return `${(ms / 1000).toFixed(1)}s`;
}
