import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@ruleback/core";
import { parseCliArgs, resolveCliOptions } from "./cliArgs";

describe("backtest CLI arg parsing", () => {
	it("captures --spec flag with space", () => {
		const args = parseCliArgs(["--spec", "configs/strategies/spy_golden_cross.json", "--json"]);
		expect(args.spec).toBe("configs/strategies/spy_golden_cross.json");
		expect(args.json).toBe(true);
	});

	it("captures flags with equals syntax", () => {
		const args = parseCliArgs(["--spec=golden.json", "--source=ccxt"]);
		expect(args.spec).toBe("golden.json");
		expect(args.source).toBe("ccxt");
	});

	it("takes the first positional as the spec path", () => {
		expect(parseCliArgs(["golden.json", "--noSave"]).spec).toBe("golden.json");
	});
});

describe("resolveCliOptions", () => {
	it("applies defaults", () => {
		expect(resolveCliOptions(parseCliArgs(["golden.json"]))).toEqual({
			help: false,
			specPath: "golden.json",
			source: undefined,
			dataDir: undefined,
			exchange: undefined,
			envPath: undefined,
			json: false,
			csv: false,
			save: true,
		});
	});

	it("reads every flag", () => {
		const options = resolveCliOptions(
			parseCliArgs([
				"--spec",
				"golden.json",
				"--source",
				"csv",
				"--dataDir",
				"prices",
				"--exchange",
				"kraken",
				"--envPath",
				".env.ci",
				"--json",
				"--csv",
				"--noSave",
			])
		);
		expect(options).toMatchObject({
			source: "csv",
			dataDir: "prices",
			exchange: "kraken",
			envPath: ".env.ci",
			json: true,
			csv: true,
			save: false,
		});
	});

	it("requires a spec unless asking for help", () => {
		expect(() => resolveCliOptions(parseCliArgs([]))).toThrow(ConfigurationError);
		expect(resolveCliOptions(parseCliArgs(["--help"])).help).toBe(true);
	});

	it("rejects an unknown source and a flag missing its value", () => {
		expect(() => resolveCliOptions(parseCliArgs(["x.json", "--source", "ftp"]))).toThrow(
			"--source must be csv or ccxt, got ftp"
		);
		expect(() => resolveCliOptions(parseCliArgs(["x.json", "--dataDir"]))).toThrow(
			"--dataDir needs a value"
		);
	});
});
