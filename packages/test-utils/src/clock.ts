export interface TestClock {
	(): Date;
	/** Move time forward by `ms`. */
	advance(ms: number): void;
	set(date: Date | string): void;
}

/** Manually driven clock for deterministic expiry and recovery tests. */
export function createTestClock(start: Date | string = "2024-01-01T00:00:00.000Z"): TestClock {
	let now = new Date(start).getTime();
	const clock = () => new Date(now);
	return Object.assign(clock, {
		advance(ms: number) {
			now += ms;
		},
		set(date: Date | string) {
			now = new Date(date).getTime();
		},
	});
}
