export const LOG_STYLES = ["auto", "always", "never"] as const;

export type LogStyle = (typeof LOG_STYLES)[number];

let logStyle: LogStyle = "auto";

export function setLogStyle(style: LogStyle): void {
	logStyle = style;
}

export function isTTY(): boolean {
	return process.stderr.isTTY === true;
}

// Diagnostics go to stderr, so that is the stream whose TTY-ness matters.
export function useDiagnosticColor(): boolean {
	if (logStyle === "always") return true;
	if (logStyle === "never") return false;
	return isTTY();
}
