/**
 * Time utilities: an injectable clock so the upkeep runner and oracle
 * staleness checks can be driven deterministically in tests.
 */

export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Manually advanced clock for tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;
