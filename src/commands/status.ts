import { branchDisplayName, resolveBranch } from "../lib/branch";
import { classifyStatus } from "../lib/classify";
import type { RenderMode } from "../lib/color";
import { debugLog, traceLog } from "../lib/debug";
import { computeDivergence } from "../lib/divergence";
import { GitError } from "../lib/errors";
import { openRepository } from "../lib/git";
import { stdout } from "../lib/output";
import type { Repository } from "../lib/repository";
import { composeSummary } from "../lib/summary";

export interface StatusOptions {
	gitDir?: string;
	color?: boolean;
	zsh?: boolean;
}

export type RepositoryOpener = (path: string) => Promise<Repository>;

/** `--zsh` wins over `--color`; the zsh escapes are emitted even without `--color`. */
export function resolveRenderMode(options: Pick<StatusOptions, "color" | "zsh">): RenderMode {
	if (options.zsh) return "prompt";
	if (options.color) return "terminal";
	return "plain";
}

export async function renderStatusLine(repo: Repository, mode: RenderMode): Promise<string> {
	if (repo.isBare) {
		throw new GitError("BareRepo", "Cannot report status on bare repository");
	}

	const records = await repo.statuses();
	const { index, worktree } = classifyStatus(records);
	traceLog(
		`${records.length} status entries: index +${index.new} ~${index.modified} -${index.deleted}, worktree +${worktree.new} ~${worktree.modified} -${worktree.deleted}`,
	);

	const branch = branchDisplayName(await resolveBranch(repo));
	const divergence = await computeDivergence(repo);

	return composeSummary({ branch, divergence, index, worktree }, mode);
}

/**
 * Print the status line for one repository.
 *
 * Repository failures are logged at debug level and print nothing, so a broken
 * repo never leaves half a prompt behind.
 */
export async function runStatus(options: StatusOptions, open: RepositoryOpener = openRepository): Promise<void> {
	const mode = resolveRenderMode(options);
	const path = options.gitDir ?? ".";
	debugLog(`repository: ${path}, render mode: ${mode}`);

	let line: string;
	try {
		const repo = await open(path);
		line = await renderStatusLine(repo, mode);
	} catch (err) {
		if (err instanceof GitError) {
			debugLog(err.message);
			return;
		}
		throw err;
	}
	stdout(`${line}\n`);
}
