const INTERVAL_UNITS = {
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
} as const;

function isIntervalUnit(unit: string): unit is keyof typeof INTERVAL_UNITS {
	return Object.hasOwn(INTERVAL_UNITS, unit);
}

/**
 * Parse a human-friendly interval string into milliseconds.
 *
 * Supported formats: "5s", "1m", "30m", "1h", "1d"
 */
export function parseInterval(interval: string): number {
	const match = interval.match(/^(\d+(?:\.\d+)?)\s*(s|m|h|d)$/);
	const rawValue = match?.[1];
	const unit = match?.[2];
	if (rawValue === undefined || unit === undefined || !isIntervalUnit(unit)) {
		throw new Error(
			`Invalid interval "${interval}". Expected format: <number><s|m|h|d> (e.g. "5s", "1m", "1h", "1d")`,
		);
	}

	const value = Number(rawValue);
	if (value <= 0) {
		throw new Error(`Interval value must be positive, got ${value}`);
	}

	return value * INTERVAL_UNITS[unit];
}

/** Apply ±25% jitter to an interval so that instances do not run in lockstep. */
export function withJitter(ms: number, random: () => number = Math.random): number {
	const jitterFactor = 0.75 + random() * 0.5;
	return Math.round(ms * jitterFactor);
}
