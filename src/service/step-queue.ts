/**
 * Runs async steps one at a time, in submission order.
 *
 * Ledger-changing operations await collaborators mid-step; queueing them
 * means no step ever observes another's partial effects.
 */
export class StepQueue {
	private tail: Promise<void> = Promise.resolve();
	private queued = 0;

	run<T>(step: () => Promise<T>): Promise<T> {
		this.queued++;
		const result = this.tail.then(step).finally(() => {
			this.queued--;
		});
		// the caller receives the step's outcome through `result`
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	/** Steps submitted and not yet finished, including the running one. */
	get pending(): number {
		return this.queued;
	}

	/** Resolves once every step submitted so far has settled. */
	async idle(): Promise<void> {
		await this.tail;
	}
}
