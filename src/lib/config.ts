import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./debug";
import { LOG_STYLES, type LogStyle } from "./tty";

export const LOG_LEVEL_ENV = "GIT_PROMPT_STATUS_LOG";
export const LOG_STYLE_ENV = "GIT_PROMPT_STATUS_LOG_STYLE";

const LogLevelSchema = z.enum(LOG_LEVELS);
const LogStyleSchema = z.enum(LOG_STYLES);

export interface Config {
	logLevel: LogLevel;
	logStyle: LogStyle;
	/** Problems found while reading the environment, reported once logging is set up. */
	warnings: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const warnings: string[] = [];

	const rawLevel = normalize(env[LOG_LEVEL_ENV]);
	let logLevel: LogLevel = "info";
	if (rawLevel !== null) {
		const parsed = LogLevelSchema.safeParse(rawLevel);
		if (parsed.success) {
			logLevel = parsed.data;
		} else {
			warnings.push(`Ignoring ${LOG_LEVEL_ENV}='${rawLevel}': expected one of ${LOG_LEVELS.join(", ")}`);
		}
	}

	const rawStyle = normalize(env[LOG_STYLE_ENV]);
	let logStyle: LogStyle = "auto";
	if (rawStyle !== null) {
		const parsed = LogStyleSchema.safeParse(rawStyle);
		if (parsed.success) {
			logStyle = parsed.data;
		} else {
			warnings.push(`Ignoring ${LOG_STYLE_ENV}='${rawStyle}': expected one of ${LOG_STYLES.join(", ")}`);
		}
	}

	return { logLevel, logStyle, warnings };
}

function normalize(value: string | undefined): string | null {
	const trimmed = value?.trim().toLowerCase() ?? "";
	return trimmed.length > 0 ? trimmed : null;
}
