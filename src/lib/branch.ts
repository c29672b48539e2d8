import { GitError } from "./errors";
import type { Repository } from "./repository";

export const NO_BRANCH = "no branch";

export type BranchResolution =
	| { kind: "resolved"; name: string }
	| { kind: "no-branch" }
	| { kind: "failed"; cause: GitError };

export async function resolveBranch(repo: Repository): Promise<BranchResolution> {
	try {
		const head = await repo.head();
		return head.shorthand ? { kind: "resolved", name: head.shorthand } : { kind: "no-branch" };
	} catch (err) {
		if (!(err instanceof GitError)) throw err;
		if (err.code === "UnbornBranch" || err.code === "NotFound") return { kind: "no-branch" };
		return { kind: "failed", cause: err };
	}
}

/** Display form of a resolution. Throws the cause when resolution failed. */
export function branchDisplayName(resolution: BranchResolution): string {
	switch (resolution.kind) {
		case "resolved":
			return resolution.name;
		case "no-branch":
			return NO_BRANCH;
		case "failed":
			throw resolution.cause;
	}
}
