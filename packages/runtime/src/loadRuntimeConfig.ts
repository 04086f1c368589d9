import path from "node:path";
import { z } from "zod";
import { ConfigurationError, findWorkspaceRoot } from "@ruleback/core";

export const DATA_SOURCES = ["csv", "ccxt"] as const;
export type DataSourceKind = (typeof DATA_SOURCES)[number];

const runtimeEnvSchema = z.object({
	RULEBACK_DATA_SOURCE: z.enum(DATA_SOURCES).default("csv"),
	RULEBACK_DATA_DIR: z.string().min(1).default("data"),
	RULEBACK_EXCHANGE: z.string().min(1).default("binance"),
	RULEBACK_OUTPUT_DIR: z.string().min(1).default("output/backtests"),
	RULEBACK_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
	RULEBACK_RETRY_BASE_MS: z.coerce.number().int().min(0).max(60_000).default(1_000),
});

export interface RuntimeConfig {
	dataSource: DataSourceKind;
	/** Absolute. */
	dataDir: string;
	exchange: string;
	/** Absolute. */
	outputDir: string;
	retry: {
		maxAttempts: number;
		baseDelayMs: number;
	};
}

export interface LoadRuntimeConfigOptions {
	/** Relative directories resolve against this; defaults to the workspace root. */
	workspaceRoot?: string;
}

// Empty strings count as unset so a blank line in .env keeps the default.
const withoutBlanks = (
	env: Record<string, string | undefined>
): Record<string, string> => {
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== "") {
			result[key] = value.trim();
		}
	}
	return result;
};

export const loadRuntimeConfig = (
	env: Record<string, string | undefined> = process.env,
	options: LoadRuntimeConfigOptions = {}
): RuntimeConfig => {
	const parsed = runtimeEnvSchema.safeParse(withoutBlanks(env));
	if (!parsed.success) {
		throw new ConfigurationError(
			parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
		);
	}
	const root = options.workspaceRoot ?? findWorkspaceRoot();
	const values = parsed.data;
	return {
		dataSource: values.RULEBACK_DATA_SOURCE,
		dataDir: path.resolve(root, values.RULEBACK_DATA_DIR),
		exchange: values.RULEBACK_EXCHANGE,
		outputDir: path.resolve(root, values.RULEBACK_OUTPUT_DIR),
		retry: {
			maxAttempts: values.RULEBACK_RETRY_ATTEMPTS,
			baseDelayMs: values.RULEBACK_RETRY_BASE_MS,
		},
	};
};
