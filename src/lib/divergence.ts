import { debugLog } from "./debug";
import { describeError } from "./errors";
import type { DivergenceCounts, Repository } from "./repository";

export const UPSTREAM_SPEC = "@{u}";

/**
 * Commits ahead of and behind the upstream of the current branch.
 *
 * Never throws: a missing upstream (or any other failure) reads as zero
 * divergence, same as a branch that is level with its upstream.
 */
export async function computeDivergence(repo: Repository): Promise<DivergenceCounts> {
	try {
		const head = await repo.revParse("HEAD");
		const upstream = await repo.revParse(UPSTREAM_SPEC);
		return await repo.aheadBehind(head, upstream);
	} catch (err) {
		debugLog(`No divergence info: ${describeError(err)}`);
		return { ahead: 0, behind: 0 };
	}
}
