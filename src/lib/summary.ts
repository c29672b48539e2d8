import { type ChangeCounters, hasChanges } from "./classify";
import { type Color, type RenderMode, formatColor } from "./color";
import type { DivergenceCounts } from "./repository";

export interface SummaryInput {
	branch: string;
	divergence: DivergenceCounts;
	index: ChangeCounters;
	worktree: ChangeCounters;
}

export const WORKTREE_PREFIX = "| ";

/** `<prefix>+new ~modified -deleted`, or "" when nothing changed on this side. */
export function stringifyStatus(counters: ChangeCounters, prefix: string, color: Color, mode: RenderMode): string {
	if (!hasChanges(counters)) return "";
	return (
		formatColor(prefix, "yellow", mode) +
		formatColor(`+${counters.new} ~${counters.modified} -${counters.deleted}`, color, mode)
	);
}

export function composeSummary(input: SummaryInput, mode: RenderMode): string {
	const { ahead, behind } = input.divergence;
	const segments = [
		formatColor(input.branch, "blue", mode),
		ahead > 0 ? formatColor(`↑${ahead}`, "green", mode) : "",
		behind > 0 ? formatColor(`↓${behind}`, "red", mode) : "",
		stringifyStatus(input.index, "", "green", mode),
		stringifyStatus(input.worktree, WORKTREE_PREFIX, "red", mode),
	];
	const body = segments.filter((segment) => segment.length > 0).join(" ");
	return `${formatColor("[", "yellow", mode)}${body}${formatColor("]", "yellow", mode)}`;
}
