import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

/**
 * Loads `.env`, `.env.local`, the file named by `RULEBACK_ENV_FILE` and
 * `extraFile`, in that order, each overriding the ones before it. Relative
 * paths resolve against `projectRoot`. Returns the paths actually read.
 */
export function loadEnvFiles(projectRoot: string, extraFile?: string): string[] {
	const candidates = filterUnique(
		[".env", ".env.local", process.env.RULEBACK_ENV_FILE, extraFile].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	return applied;
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
