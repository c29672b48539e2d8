export type Color = "black" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "white";

/**
 * How rendered segments are colored.
 *
 * - `plain`: no escapes at all
 * - `terminal`: ANSI SGR escapes
 * - `prompt`: zsh prompt `%F{color}...%f` directives
 */
export type RenderMode = "plain" | "terminal" | "prompt";

const ANSI_CODES: Record<Color, number> = {
	black: 30,
	red: 31,
	green: 32,
	yellow: 33,
	blue: 34,
	magenta: 35,
	cyan: 36,
	white: 37,
};

const RESET = "\x1b[0m";

// zsh prompt colors wired up so far. Anything else renders the placeholder below.
const PROMPT_COLORS: Partial<Record<Color, string>> = {
	blue: "blue",
	green: "green",
	red: "red",
	yellow: "yellow",
};

export const UNSUPPORTED_PROMPT_COLOR = "not implemented yet";

export function formatColor(text: string, color: Color, mode: RenderMode): string {
	if (text.length === 0) return "";
	switch (mode) {
		case "plain":
			return text;
		case "terminal":
			return `\x1b[${ANSI_CODES[color]}m${text}${RESET}`;
		case "prompt": {
			const name = PROMPT_COLORS[color] ?? UNSUPPORTED_PROMPT_COLOR;
			// A bare % starts a prompt escape in zsh
			return `%F{${name}}${text.replaceAll("%", "%%")}%f`;
		}
	}
}
