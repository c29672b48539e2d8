import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

const PackageManifestSchema = z.object({ version: z.string() });

// src/ and dist/ both sit one level below the package root.
export function readVersion(manifestPath = join(__dirname, "..", "package.json")): string {
	try {
		const parsed = PackageManifestSchema.safeParse(JSON.parse(readFileSync(manifestPath, "utf-8")));
		return parsed.success ? parsed.data.version : "unknown";
	} catch {
		return "unknown";
	}
}
