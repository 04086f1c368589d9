import fs from "node:fs";
import path from "node:path";

import { parseStrategySpecJson } from "./spec/parseSpec";
import type { StrategySpecification } from "./spec/types";

const WORKSPACE_SENTINELS = [".git", "package-lock.json"];

let cachedWorkspaceRoot: string | undefined;

export const findWorkspaceRoot = (start = process.cwd()): string => {
	if (start === process.cwd() && cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = start;
	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			current = start;
			break;
		}
		current = parent;
	}

	if (start === process.cwd()) {
		cachedWorkspaceRoot = current;
	}
	return current;
};

/**
 * Reads a strategy document from disk. Looks for the path as given, then
 * under `<dir>/strategies/<name>.json`, mirroring how profiles are stored.
 */
export const resolveSpecPath = (specPath: string, strategyDir?: string): string => {
	const withExt = specPath.endsWith(".json") ? specPath : `${specPath}.json`;
	const candidates = [path.resolve(specPath), path.resolve(withExt)];
	if (strategyDir) {
		candidates.push(path.join(strategyDir, "strategies", withExt));
		candidates.push(path.join(strategyDir, withExt));
	}
	for (const candidate of candidates) {
		if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
			return candidate;
		}
	}
	throw new Error(`Strategy spec not found. Looked for ${candidates.join(", ")}`);
};

export const loadStrategySpecFile = (
	specPath: string,
	strategyDir?: string
): StrategySpecification => {
	const resolved = resolveSpecPath(specPath, strategyDir);
	return parseStrategySpecJson(fs.readFileSync(resolved, "utf-8"));
};
