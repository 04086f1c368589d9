import { ConfigurationError } from "@ruleback/core";

export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.spec === undefined) {
		args.spec = positionals[0];
	}
	return args;
};

export type SourceFlag = "csv" | "ccxt";

export interface BacktestCliOptions {
	help: boolean;
	specPath?: string;
	source?: SourceFlag;
	dataDir?: string;
	exchange?: string;
	envPath?: string;
	json: boolean;
	csv: boolean;
	save: boolean;
}

const isTrue = (value: ArgValue | undefined): boolean =>
	value === true || value === "true";

const stringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || value.length === 0) {
		throw new ConfigurationError([`--${key} needs a value`]);
	}
	return value;
};

const sourceArg = (args: Record<string, ArgValue>): SourceFlag | undefined => {
	const value = stringArg(args, "source");
	if (value === undefined || value === "csv" || value === "ccxt") {
		return value;
	}
	throw new ConfigurationError([`--source must be csv or ccxt, got ${value}`]);
};

/** Typed view of the parsed flags; `--spec` is required unless `--help`. */
export const resolveCliOptions = (
	args: Record<string, ArgValue>
): BacktestCliOptions => {
	const help = isTrue(args.help);
	const specPath = stringArg(args, "spec");
	if (!help && !specPath) {
		throw new ConfigurationError(["Missing required --spec <file.json>"]);
	}
	return {
		help,
		specPath,
		source: sourceArg(args),
		dataDir: stringArg(args, "dataDir"),
		exchange: stringArg(args, "exchange"),
		envPath: stringArg(args, "envPath") ?? stringArg(args, "env"),
		json: isTrue(args.json),
		csv: isTrue(args.csv),
		save: !isTrue(args.noSave),
	};
};
