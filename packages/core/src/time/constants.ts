export const DAY_MS = 86_400_000;

export const TRADING_DAYS_PER_YEAR = 252;

/** Trailing window of the realized-volatility median a vol filter compares against. */
export const VOL_MEDIAN_WINDOW = 252;
