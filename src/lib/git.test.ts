import { spawnSync } from "node:child_process";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { renderStatusLine } from "../commands/status";
import { openRepository, parseAheadBehind, parsePorcelainStatus, shortenRefName, statusFlags } from "./git";

function flagsOf(x: string, y: string): string[] {
	return [...statusFlags(x, y)].sort();
}

describe("statusFlags", () => {
	test("maps index column codes", () => {
		expect(flagsOf("A", " ")).toEqual(["indexNew"]);
		expect(flagsOf("M", " ")).toEqual(["indexModified"]);
		expect(flagsOf("D", " ")).toEqual(["indexDeleted"]);
		expect(flagsOf("R", " ")).toEqual(["indexRenamed"]);
		expect(flagsOf("T", " ")).toEqual(["indexTypeChange"]);
		expect(flagsOf("C", " ")).toEqual(["indexNew"]);
	});

	test("maps worktree column codes", () => {
		expect(flagsOf(" ", "M")).toEqual(["worktreeModified"]);
		expect(flagsOf(" ", "D")).toEqual(["worktreeDeleted"]);
		expect(flagsOf(" ", "T")).toEqual(["worktreeTypeChange"]);
	});

	test("combines both columns", () => {
		expect(flagsOf("A", "M")).toEqual(["indexNew", "worktreeModified"]);
	});

	test("untracked and ignored entries", () => {
		expect(flagsOf("?", "?")).toEqual(["worktreeNew"]);
		expect(flagsOf("!", "!")).toEqual(["ignored"]);
	});

	test("unmerged pairs are conflicts only", () => {
		for (const pair of ["DD", "AU", "UD", "UA", "DU", "AA", "UU"]) {
			expect(flagsOf(pair.charAt(0), pair.charAt(1))).toEqual(["conflicted"]);
		}
	});
});

describe("parsePorcelainStatus", () => {
	test("empty output has no records", () => {
		expect(parsePorcelainStatus("")).toEqual([]);
	});

	test("parses NUL-separated entries", () => {
		const records = parsePorcelainStatus("M  src/a.ts\0 M src/b.ts\0?? notes.md\0");
		expect(records.map((r) => [r.path, [...r.status], r.hasWorktreeDelta])).toEqual([
			["src/a.ts", ["indexModified"], false],
			["src/b.ts", ["worktreeModified"], true],
			["notes.md", ["worktreeNew"], true],
		]);
	});

	test("skips the source path of a rename", () => {
		const records = parsePorcelainStatus("R  new name.ts\0old name.ts\0D  gone.ts\0");
		expect(records.map((r) => r.path)).toEqual(["new name.ts", "gone.ts"]);
		expect([...(records[0]?.status ?? [])]).toEqual(["indexRenamed"]);
	});
});

describe("shortenRefName", () => {
	test("strips well-known prefixes", () => {
		expect(shortenRefName("refs/heads/main")).toBe("main");
		expect(shortenRefName("refs/heads/feature/login")).toBe("feature/login");
		expect(shortenRefName("refs/remotes/origin/main")).toBe("origin/main");
		expect(shortenRefName("refs/tags/v1.0.0")).toBe("v1.0.0");
		expect(shortenRefName("refs/notes/commits")).toBe("notes/commits");
	});

	test("leaves other names alone", () => {
		expect(shortenRefName("HEAD")).toBe("HEAD");
	});

	test("null when nothing is left", () => {
		expect(shortenRefName("refs/heads/")).toBeNull();
	});
});

describe("parseAheadBehind", () => {
	test("parses rev-list left-right counts", () => {
		expect(parseAheadBehind("3\t1\n")).toEqual({ ahead: 3, behind: 1 });
		expect(parseAheadBehind("0\t0\n")).toEqual({ ahead: 0, behind: 0 });
	});

	test("null for unexpected output", () => {
		expect(parseAheadBehind("")).toBeNull();
		expect(parseAheadBehind("fatal: bad revision")).toBeNull();
	});
});

describe("git repo functions", () => {
	let tmpDir: string;
	let bareDir: string;
	let repoDir: string;

	const run = (dir: string, ...args: string[]) => {
		const result = spawnSync("git", ["-C", dir, ...args], { encoding: "utf-8" });
		if (result.status !== 0) throw new Error(`git ${args.join(" ")} failed: ${result.stderr}`);
	};

	const initRepo = (dir: string, ...flags: string[]) => {
		mkdirSync(dir, { recursive: true });
		run(dir, "-c", "init.defaultBranch=main", "init", ...flags);
	};

	const configureGitIdentity = (dir: string) => {
		run(dir, "config", "user.name", "Prompt Status Test");
		run(dir, "config", "user.email", "prompt-status-test@example.com");
		run(dir, "config", "commit.gpgsign", "false");
	};

	const statusLine = async (path: string) => renderStatusLine(await openRepository(path), "plain");

	beforeEach(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "git-prompt-status-git-test-"));
		bareDir = join(tmpDir, "bare.git");
		repoDir = join(tmpDir, "work");

		initRepo(bareDir, "--bare");
		initRepo(repoDir);
		configureGitIdentity(repoDir);
		run(repoDir, "commit", "--allow-empty", "-m", "init");
		run(repoDir, "remote", "add", "origin", bareDir);
		run(repoDir, "push", "-u", "origin", "main");
	});

	afterEach(() => {
		rmSync(tmpDir, { recursive: true, force: true });
	});

	describe("openRepository", () => {
		test("detects a bare repository", async () => {
			const repo = await openRepository(bareDir);
			expect(repo.isBare).toBe(true);
		});

		test("a work tree is not bare", async () => {
			const repo = await openRepository(repoDir);
			expect(repo.isBare).toBe(false);
			expect(repo.workDir).toBe(repoDir);
		});

		test("a missing directory cannot be opened", async () => {
			await expect(openRepository(join(tmpDir, "missing"))).rejects.toThrow(
				`Could not find repository at '${join(tmpDir, "missing")}'`,
			);
		});

		test("opening through the .git directory reports the work tree", async () => {
			writeFileSync(join(repoDir, "staged.txt"), "content");
			run(repoDir, "add", "staged.txt");
			const repo = await openRepository(join(repoDir, ".git"));
			expect(repo.isBare).toBe(false);
			expect(repo.path).toBe(join(repoDir, ".git"));
			expect(await renderStatusLine(repo, "plain")).toBe("[main +1 ~0 -0]");
		});
	});

	describe("status line", () => {
		test("clean tree level with its upstream", async () => {
			expect(await statusLine(repoDir)).toBe("[main]");
		});

		test("staged and untracked files are counted on their own side", async () => {
			writeFileSync(join(repoDir, "staged.txt"), "content");
			run(repoDir, "add", "staged.txt");
			writeFileSync(join(repoDir, "untracked.txt"), "content");
			expect(await statusLine(repoDir)).toBe("[main +1 ~0 -0 | +1 ~0 -0]");
		});

		test("modified and deleted tracked files", async () => {
			writeFileSync(join(repoDir, "a.txt"), "one");
			writeFileSync(join(repoDir, "b.txt"), "two");
			run(repoDir, "add", "a.txt", "b.txt");
			run(repoDir, "commit", "-m", "add files");
			writeFileSync(join(repoDir, "a.txt"), "changed");
			rmSync(join(repoDir, "b.txt"));
			expect(await statusLine(repoDir)).toBe("[main ↑1 | +0 ~1 -1]");
		});

		test("a staged rename counts as a new file and a deletion", async () => {
			writeFileSync(join(repoDir, "old.txt"), "content");
			run(repoDir, "add", "old.txt");
			run(repoDir, "commit", "-m", "add old");
			run(repoDir, "push", "origin", "main");
			run(repoDir, "mv", "old.txt", "new.txt");
			expect(await statusLine(repoDir)).toBe("[main +1 ~0 -1]");
		});

		test("diverged from its upstream", async () => {
			const otherDir = join(tmpDir, "other");
			run(tmpDir, "clone", "--quiet", bareDir, otherDir);
			configureGitIdentity(otherDir);
			run(otherDir, "commit", "--allow-empty", "-m", "theirs");
			run(otherDir, "push", "origin", "main");

			run(repoDir, "commit", "--allow-empty", "-m", "ours");
			run(repoDir, "fetch", "origin");
			expect(await statusLine(repoDir)).toBe("[main ↑1 ↓1]");
		});

		test("detached HEAD shows HEAD", async () => {
			run(repoDir, "checkout", "--quiet", "--detach");
			expect(await statusLine(repoDir)).toBe("[HEAD]");
		});

		test("repository without commits shows the no branch sentinel", async () => {
			const freshDir = join(tmpDir, "fresh");
			initRepo(freshDir);
			writeFileSync(join(freshDir, "notes.md"), "draft");
			expect(await statusLine(freshDir)).toBe("[no branch | +1 ~0 -0]");
		});
	});
});
