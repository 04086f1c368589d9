import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

// The evaluation engine must stay a pure computation: no I/O, no exchange
// clients, no dependency on the workflow layer.
const FORBIDDEN = /from "(node:[a-z_/]+|fs|path|ccxt|dotenv|@ruleback\/(data|runtime))"/;
const PACKAGES_ROOT = path.join(__dirname, "../../..");
const PURE_PACKAGES = [
	"indicators",
	"strategy-engine",
	"backtest-core",
	"spec-validator",
	"metrics",
];

const walkFiles = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
		const stat = fs.statSync(current);
		if (stat.isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist") continue;
				stack.push(path.join(current, entry));
			}
			continue;
		}
		if (current.endsWith(".ts") && !current.endsWith(".test.ts")) {
			results.push(current);
		}
	}
	return results;
};

const dependencyNames = (pkg: unknown): string[] => {
	if (typeof pkg !== "object" || pkg === null || !("dependencies" in pkg)) {
		return [];
	}
	const deps = pkg.dependencies;
	return typeof deps === "object" && deps !== null ? Object.keys(deps) : [];
};

describe("engine import boundaries", () => {
	it("pure packages import no I/O modules", () => {
		const offenders: string[] = [];
		for (const name of PURE_PACKAGES) {
			const dir = path.join(PACKAGES_ROOT, name, "src");
			for (const file of walkFiles(dir)) {
				const content = fs.readFileSync(file, "utf8");
				if (FORBIDDEN.test(content)) {
					offenders.push(`${name}:${path.relative(dir, file)}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});

	it("pure packages declare no I/O dependencies", () => {
		const offenders: string[] = [];
		for (const name of PURE_PACKAGES) {
			const pkgPath = path.join(PACKAGES_ROOT, name, "package.json");
			const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
			for (const dep of dependencyNames(pkg)) {
				if (dep === "ccxt" || dep === "@ruleback/data" || dep === "@ruleback/runtime") {
					offenders.push(`${name}:${dep}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});
});
