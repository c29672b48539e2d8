// ── Raw status model ──

export type StatusFlag =
	| "indexNew"
	| "indexModified"
	| "indexDeleted"
	| "indexRenamed"
	| "indexTypeChange"
	| "worktreeNew"
	| "worktreeModified"
	| "worktreeDeleted"
	| "worktreeRenamed"
	| "worktreeTypeChange"
	| "conflicted"
	| "ignored";

/** Composite per-file status. The empty set means the file is current (unmodified). */
export type ChangeStatus = ReadonlySet<StatusFlag>;

export interface RawChangeRecord {
	path: string;
	status: ChangeStatus;
	/** Whether a worktree-vs-index diff exists for this entry. */
	hasWorktreeDelta: boolean;
}

export interface HeadReference {
	/** Fully qualified name, e.g. `refs/heads/main`, or `HEAD` when detached. */
	name: string;
	shorthand: string | null;
}

export interface DivergenceCounts {
	ahead: number;
	behind: number;
}

/**
 * Read-only view of a git repository.
 *
 * Failures are thrown as `GitError`. `head()` uses the `UnbornBranch` and
 * `NotFound` codes when HEAD does not point at a commit.
 */
export interface Repository {
	readonly path: string;
	readonly isBare: boolean;
	statuses(): Promise<RawChangeRecord[]>;
	head(): Promise<HeadReference>;
	/** Resolve a revision spec such as `HEAD` or `@{u}` to a commit id. */
	revParse(spec: string): Promise<string>;
	/** Commits reachable from `local` but not `upstream`, and the reverse. */
	aheadBehind(local: string, upstream: string): Promise<DivergenceCounts>;
}

export function isCurrent(status: ChangeStatus): boolean {
	return status.size === 0;
}
