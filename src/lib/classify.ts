import { type RawChangeRecord, type StatusFlag, isCurrent } from "./repository";

export interface ChangeCounters {
	new: number;
	modified: number;
	deleted: number;
}

export interface ClassifiedStatus {
	index: ChangeCounters;
	worktree: ChangeCounters;
}

type Category = keyof ChangeCounters;

// Priority order, first match wins. Renames and type changes count as modifications.
const INDEX_RULES: readonly (readonly [StatusFlag, Category])[] = [
	["indexNew", "new"],
	["indexModified", "modified"],
	["indexDeleted", "deleted"],
	["indexRenamed", "modified"],
	["indexTypeChange", "modified"],
];

const WORKTREE_RULES: readonly (readonly [StatusFlag, Category])[] = [
	["worktreeNew", "new"],
	["worktreeModified", "modified"],
	["worktreeDeleted", "deleted"],
	["worktreeRenamed", "modified"],
	["worktreeTypeChange", "modified"],
];

export function emptyCounters(): ChangeCounters {
	return { new: 0, modified: 0, deleted: 0 };
}

export function hasChanges(counters: ChangeCounters): boolean {
	return counters.new > 0 || counters.modified > 0 || counters.deleted > 0;
}

function tally(records: Iterable<RawChangeRecord>, rules: typeof INDEX_RULES): ChangeCounters {
	const counters = emptyCounters();
	for (const record of records) {
		const rule = rules.find(([flag]) => record.status.has(flag));
		// Conflicted and ignored entries match no rule
		if (rule) counters[rule[1]]++;
	}
	return counters;
}

export function classifyStatus(records: readonly RawChangeRecord[]): ClassifiedStatus {
	const changed = records.filter((record) => !isCurrent(record.status));
	return {
		index: tally(changed, INDEX_RULES),
		// An entry can be listed without an actual worktree change
		worktree: tally(
			changed.filter((record) => record.hasWorktreeDelta),
			WORKTREE_RULES,
		),
	};
}
