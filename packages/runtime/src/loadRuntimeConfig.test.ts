import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@ruleback/core";
import { loadRuntimeConfig } from "./loadRuntimeConfig";

const root = path.resolve("/srv/ruleback");

describe("loadRuntimeConfig", () => {
	it("falls back to defaults", () => {
		expect(loadRuntimeConfig({}, { workspaceRoot: root })).toEqual({
			dataSource: "csv",
			dataDir: path.join(root, "data"),
			exchange: "binance",
			outputDir: path.join(root, "output/backtests"),
			retry: { maxAttempts: 3, baseDelayMs: 1_000 },
		});
	});

	it("reads overrides and treats blanks as unset", () => {
		const config = loadRuntimeConfig(
			{
				RULEBACK_DATA_SOURCE: "ccxt",
				RULEBACK_DATA_DIR: "/var/prices",
				RULEBACK_EXCHANGE: " kraken ",
				RULEBACK_OUTPUT_DIR: "",
				RULEBACK_RETRY_ATTEMPTS: "5",
				RULEBACK_RETRY_BASE_MS: "0",
			},
			{ workspaceRoot: root }
		);
		expect(config.dataSource).toBe("ccxt");
		expect(config.dataDir).toBe(path.resolve("/var/prices"));
		expect(config.exchange).toBe("kraken");
		expect(config.outputDir).toBe(path.join(root, "output/backtests"));
		expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 0 });
	});

	it("rejects values it cannot use", () => {
		expect(() =>
			loadRuntimeConfig(
				{ RULEBACK_DATA_SOURCE: "ftp", RULEBACK_RETRY_ATTEMPTS: "many" },
				{ workspaceRoot: root }
			)
		).toThrow(ConfigurationError);
	});
});
