export type GitErrorCode = "NotFound" | "UnbornBranch" | "BareRepo" | "Generic";

export class GitError extends Error {
	readonly code: GitErrorCode;

	constructor(code: GitErrorCode, message: string) {
		super(message);
		this.name = "GitError";
		this.code = code;
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
