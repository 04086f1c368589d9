/**
 * Trailing simple moving average for every index. Early rows average
 * whatever history exists (minimum one observation); NaN inputs are skipped.
 */
export function rollingMean(values: readonly number[], window: number): number[] {
	return values.map((_, idx) => {
		if (window <= 0) {
			return Number.NaN;
		}
		let sum = 0;
		let count = 0;
		for (let i = Math.max(0, idx - window + 1); i <= idx; i += 1) {
			const value = values[i];
			if (Number.isFinite(value)) {
				sum += value;
				count += 1;
			}
		}
		return count > 0 ? sum / count : Number.NaN;
	});
}
