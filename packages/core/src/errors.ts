export type RulebackErrorCode =
	| "SPECIFICATION_ERROR"
	| "STRUCTURAL_VALIDATION_FAILURE"
	| "DATA_UNAVAILABLE"
	| "DATA_VALIDATION_ERROR"
	| "RULE_CONFIGURATION_MISMATCH"
	| "CONFIGURATION_ERROR";

export class RulebackError extends Error {
	constructor(
		readonly code: RulebackErrorCode,
		message: string
	) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Malformed interchange input: bad dates, unknown rule type, empty rule list.
 * Raised at parse time and blocks the whole workflow.
 */
export class SpecificationError extends RulebackError {
	constructor(readonly issues: string[]) {
		super(
			"SPECIFICATION_ERROR",
			issues.length === 1
				? `Invalid strategy specification: ${issues[0]}`
				: `Invalid strategy specification:\n  - ${issues.join("\n  - ")}`
		);
	}
}

/** The specification parsed but its rule set is contradictory. */
export class StructuralValidationFailure extends RulebackError {
	constructor(
		readonly errors: string[],
		readonly warnings: string[] = []
	) {
		super(
			"STRUCTURAL_VALIDATION_FAILURE",
			`Strategy failed structural validation: ${errors.join(" ")}`
		);
	}
}

export class DataUnavailableError extends RulebackError {
	constructor(
		message: string,
		readonly ticker?: string
	) {
		super("DATA_UNAVAILABLE", message);
	}
}

export class DataValidationError extends RulebackError {
	constructor(
		readonly errors: string[],
		readonly warnings: string[] = []
	) {
		super(
			"DATA_VALIDATION_ERROR",
			`Price data failed validation: ${errors.join(" ")}`
		);
	}
}

/** A rule needs an indicator column the feature table does not carry. */
export class RuleConfigurationMismatch extends RulebackError {
	constructor(readonly missingColumns: string[]) {
		super(
			"RULE_CONFIGURATION_MISMATCH",
			`Feature table is missing columns required by the strategy: ${missingColumns.join(", ")}`
		);
	}
}

/** Environment or command-line settings the runtime cannot use. */
export class ConfigurationError extends RulebackError {
	constructor(readonly issues: string[]) {
		super("CONFIGURATION_ERROR", `Invalid configuration: ${issues.join("; ")}`);
	}
}

export const isRulebackError = (value: unknown): value is RulebackError =>
	value instanceof RulebackError;

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
