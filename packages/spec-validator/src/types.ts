export interface ValidationResult {
	ok: boolean;
	errors: string[];
	warnings: string[];
}

const dedupe = (messages: readonly string[]): string[] => [...new Set(messages)];

/** Drops repeated messages, keeping first-seen order. */
export const toValidationResult = (
	errors: readonly string[],
	warnings: readonly string[]
): ValidationResult => {
	const uniqueErrors = dedupe(errors);
	return {
		ok: uniqueErrors.length === 0,
		errors: uniqueErrors,
		warnings: dedupe(warnings),
	};
};
