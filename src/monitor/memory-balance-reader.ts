import type { HarvestError } from "../shared/errors.js";
import type { UserId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { BalanceReader } from "./types.js";

/**
 * In-memory balances for paper runs and tests. Unknown users read as 0n.
 *
 * @example
 * const balances = new MemoryBalanceReader();
 * balances.set(user, parseEther("5"));
 * balances.credit(user, parseEther("1")); // reward arrives
 */
export class MemoryBalanceReader implements BalanceReader {
	private readonly balances = new Map<UserId, bigint>();
	private readonly failures = new Map<UserId, HarvestError>();

	async balanceOf(user: UserId): Promise<Result<bigint, HarvestError>> {
		const failure = this.failures.get(user);
		if (failure) return err(failure);
		return ok(this.balances.get(user) ?? 0n);
	}

	set(user: UserId, balance: bigint): void {
		this.balances.set(user, balance);
	}

	/** Add `amount` (may be negative) to the user's balance. */
	credit(user: UserId, amount: bigint): bigint {
		const next = (this.balances.get(user) ?? 0n) + amount;
		this.balances.set(user, next);
		return next;
	}

	/** Make reads for `user` fail with `error` until {@link recover} is called. */
	fail(user: UserId, error: HarvestError): void {
		this.failures.set(user, error);
	}

	recover(user: UserId): void {
		this.failures.delete(user);
	}
}
