import { GitError } from "./errors";
import type { DivergenceCounts, HeadReference, RawChangeRecord, Repository, StatusFlag } from "./repository";

export function makeRecord(flags: StatusFlag[], overrides: Partial<RawChangeRecord> = {}): RawChangeRecord {
	return {
		path: "file.txt",
		status: new Set(flags),
		hasWorktreeDelta: flags.some((flag) => flag.startsWith("worktree")),
		...overrides,
	};
}

export interface FakeRepositoryState {
	path: string;
	isBare: boolean;
	records: RawChangeRecord[];
	head: HeadReference | GitError;
	/** Upstream commit id, or null when no upstream is configured. */
	upstream: string | null;
	divergence: DivergenceCounts;
}

/** In-memory stand-in for a git repository. */
export class FakeRepository implements Repository {
	readonly path: string;
	readonly isBare: boolean;
	readonly calls: string[] = [];
	private readonly state: FakeRepositoryState;

	constructor(overrides: Partial<FakeRepositoryState> = {}) {
		this.state = {
			path: "/repo",
			isBare: false,
			records: [],
			head: { name: "refs/heads/main", shorthand: "main" },
			upstream: null,
			divergence: { ahead: 0, behind: 0 },
			...overrides,
		};
		this.path = this.state.path;
		this.isBare = this.state.isBare;
	}

	async statuses(): Promise<RawChangeRecord[]> {
		this.calls.push("statuses");
		return this.state.records;
	}

	async head(): Promise<HeadReference> {
		this.calls.push("head");
		if (this.state.head instanceof GitError) throw this.state.head;
		return this.state.head;
	}

	async revParse(spec: string): Promise<string> {
		this.calls.push(`revParse ${spec}`);
		if (spec === "HEAD") return "1111111";
		if (spec === "@{u}" && this.state.upstream !== null) return this.state.upstream;
		throw new GitError("NotFound", `Revspec '${spec}' not found`);
	}

	async aheadBehind(local: string, upstream: string): Promise<DivergenceCounts> {
		this.calls.push(`aheadBehind ${local} ${upstream}`);
		return this.state.divergence;
	}
}
