import { formatColor } from "./color";
import { useDiagnosticColor } from "./tty";

const DIM = "\x1b[2m";
const NC = "\x1b[0m";

export function red(text: string): string {
	return useDiagnosticColor() ? formatColor(text, "red", "terminal") : text;
}

export function yellow(text: string): string {
	return useDiagnosticColor() ? formatColor(text, "yellow", "terminal") : text;
}

export function dim(text: string): string {
	if (!useDiagnosticColor()) return text;
	return `${DIM}${text}${NC}`;
}

export function error(text: string): void {
	process.stderr.write(`${red(text)}\n`);
}

export function stdout(text: string): void {
	process.stdout.write(text);
}
