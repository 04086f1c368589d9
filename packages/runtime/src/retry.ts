export interface RetryOptions {
	maxAttempts?: number;
	baseDelayMs?: number;
	maxDelayMs?: number;
	/** Called before each wait with the attempt that just failed. */
	onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
	/** Errors this rejects are rethrown at once. */
	shouldRetry?: (error: unknown) => boolean;
	sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

/** Exponential backoff: base, 2×base, 4×base… capped at `maxDelayMs`. */
export const backoffDelay = (
	attempt: number,
	baseDelayMs: number,
	maxDelayMs: number
): number => Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));

/**
 * Runs `fn` until it resolves or `maxAttempts` calls have failed, then
 * rethrows the last error.
 */
export async function withRetry<T>(
	fn: (attempt: number) => Promise<T>,
	options: RetryOptions = {}
): Promise<T> {
	const {
		maxAttempts = 3,
		baseDelayMs = 1_000,
		maxDelayMs = 10_000,
		onRetry,
		shouldRetry = () => true,
		sleep = defaultSleep,
	} = options;
	const attempts = Math.max(1, Math.floor(maxAttempts));

	let lastError: unknown;
	for (let attempt = 1; attempt <= attempts; attempt++) {
		try {
			return await fn(attempt);
		} catch (error) {
			lastError = error;
			if (attempt === attempts || !shouldRetry(error)) {
				break;
			}
			const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
			onRetry?.(attempt, error, delay);
			await sleep(delay);
		}
	}

	throw lastError;
}
