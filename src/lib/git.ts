import { spawn } from "node:child_process";
import { dirname } from "node:path";
import { debugGit } from "./debug";
import { GitError } from "./errors";
import type { ChangeStatus, DivergenceCounts, HeadReference, RawChangeRecord, Repository, StatusFlag } from "./repository";

export interface GitResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

export function git(repoDir: string, ...args: string[]): Promise<GitResult> {
	const command = ["git", "-C", repoDir, ...args].join(" ");
	const start = performance.now();
	return new Promise((resolve, reject) => {
		const proc = spawn("git", ["-C", repoDir, ...args], {
			stdio: ["ignore", "pipe", "pipe"],
			// Keep `git status` from refreshing the index behind our back
			env: { ...process.env, GIT_OPTIONAL_LOCKS: "0" },
		});
		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];
		proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
		proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
		proc.on("error", (err) => {
			reject(new GitError("Generic", `Failed to run git: ${err.message}`));
		});
		proc.on("close", (code) => {
			const exitCode = code ?? 1;
			debugGit(command, performance.now() - start, exitCode);
			resolve({
				exitCode,
				stdout: Buffer.concat(stdout).toString("utf-8"),
				stderr: Buffer.concat(stderr).toString("utf-8"),
			});
		});
	});
}

function failure(result: GitResult, fallback: string): GitError {
	const message = result.stderr.trim().replace(/^fatal: /, "");
	return new GitError("Generic", message || fallback);
}

// ── Porcelain status parsing ──

const INDEX_FLAGS: Record<string, StatusFlag> = {
	A: "indexNew",
	C: "indexNew",
	M: "indexModified",
	D: "indexDeleted",
	R: "indexRenamed",
	T: "indexTypeChange",
};

const WORKTREE_FLAGS: Record<string, StatusFlag> = {
	M: "worktreeModified",
	D: "worktreeDeleted",
	R: "worktreeRenamed",
	T: "worktreeTypeChange",
};

const UNMERGED_PAIRS = new Set(["DD", "AU", "UD", "UA", "DU", "AA", "UU"]);

export function statusFlags(x: string, y: string): ChangeStatus {
	const pair = `${x}${y}`;
	if (pair === "??") return new Set<StatusFlag>(["worktreeNew"]);
	if (pair === "!!") return new Set<StatusFlag>(["ignored"]);
	if (UNMERGED_PAIRS.has(pair)) return new Set<StatusFlag>(["conflicted"]);

	const flags = new Set<StatusFlag>();
	const indexFlag = INDEX_FLAGS[x];
	if (indexFlag) flags.add(indexFlag);
	const worktreeFlag = WORKTREE_FLAGS[y];
	if (worktreeFlag) flags.add(worktreeFlag);
	return flags;
}

/**
 * Parse `git status --porcelain=v1 -z` output.
 *
 * Entries are NUL-terminated `XY path` records. Renames and copies are followed
 * by an extra field holding the source path, which is skipped.
 */
export function parsePorcelainStatus(output: string): RawChangeRecord[] {
	const fields = output.split("\0");
	const records: RawChangeRecord[] = [];
	for (let i = 0; i < fields.length; i++) {
		const entry = fields[i] ?? "";
		if (entry.length < 4) continue;
		const x = entry.charAt(0);
		const y = entry.charAt(1);
		if (x === "R" || x === "C" || y === "R" || y === "C") i++;
		records.push({
			path: entry.slice(3),
			status: statusFlags(x, y),
			hasWorktreeDelta: y !== " ",
		});
	}
	return records;
}

// ── References ──

const REF_PREFIXES = ["refs/heads/", "refs/remotes/", "refs/tags/", "refs/"];

export function shortenRefName(name: string): string | null {
	const prefix = REF_PREFIXES.find((p) => name.startsWith(p));
	const short = prefix ? name.slice(prefix.length) : name;
	return short.length > 0 ? short : null;
}

export function parseAheadBehind(output: string): DivergenceCounts | null {
	const match = output.trim().match(/^(\d+)\s+(\d+)$/);
	if (!match?.[1] || !match[2]) return null;
	return { ahead: Number(match[1]), behind: Number(match[2]) };
}

// ── Repository backed by the git binary ──

export class GitRepository implements Repository {
	/**
	 * @param path - the directory the repository was opened from
	 * @param workDir - where git commands run; differs from `path` when opened through a `.git` directory
	 */
	constructor(
		readonly path: string,
		readonly isBare: boolean,
		readonly workDir: string = path,
	) {}

	async statuses(): Promise<RawChangeRecord[]> {
		// Renames show up as a deletion plus a new file
		const result = await git(
			this.workDir,
			"status",
			"--porcelain=v1",
			"-z",
			"--no-renames",
			"--untracked-files=all",
			"--ignore-submodules=all",
		);
		if (result.exitCode !== 0) throw failure(result, "Cannot read repository status");
		return parsePorcelainStatus(result.stdout);
	}

	async head(): Promise<HeadReference> {
		const symbolic = await git(this.workDir, "symbolic-ref", "--quiet", "HEAD");
		// Exit 1 means HEAD is detached; anything else non-zero is a real failure
		if (symbolic.exitCode !== 0 && symbolic.exitCode !== 1) {
			throw failure(symbolic, "Cannot read HEAD");
		}
		const commit = await git(this.workDir, "rev-parse", "--verify", "--quiet", "HEAD^{commit}");
		if (symbolic.exitCode === 0) {
			const name = symbolic.stdout.trim();
			if (commit.exitCode !== 0) {
				throw new GitError("UnbornBranch", `Reference '${name}' not found`);
			}
			return { name, shorthand: shortenRefName(name) };
		}
		if (commit.exitCode !== 0) {
			throw new GitError("NotFound", "Reference 'HEAD' not found");
		}
		return { name: "HEAD", shorthand: "HEAD" };
	}

	async revParse(spec: string): Promise<string> {
		const result = await git(this.workDir, "rev-parse", "--verify", "--quiet", `${spec}^{commit}`);
		const id = result.stdout.trim();
		if (result.exitCode !== 0 || id.length === 0) {
			throw new GitError("NotFound", `Revspec '${spec}' not found`);
		}
		return id;
	}

	async aheadBehind(local: string, upstream: string): Promise<DivergenceCounts> {
		const result = await git(this.workDir, "rev-list", "--left-right", "--count", `${local}...${upstream}`);
		if (result.exitCode !== 0) throw failure(result, `Cannot count commits between ${local} and ${upstream}`);
		const counts = parseAheadBehind(result.stdout);
		if (!counts) throw new GitError("Generic", `Unexpected rev-list output: ${result.stdout.trim()}`);
		return counts;
	}
}

export async function openRepository(path: string): Promise<GitRepository> {
	const result = await git(path, "rev-parse", "--is-bare-repository", "--is-inside-git-dir", "--absolute-git-dir");
	if (result.exitCode !== 0) {
		throw new GitError("NotFound", `Could not find repository at '${path}'`);
	}
	const [bare, insideGitDir, gitDir] = result.stdout.trim().split("\n");
	const isBare = bare === "true";
	// Opened through the .git directory of a non-bare repo: run against its work tree
	if (!isBare && insideGitDir === "true" && gitDir) {
		return new GitRepository(path, isBare, dirname(gitDir));
	}
	return new GitRepository(path, isBare);
}
