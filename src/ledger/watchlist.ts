/**
 * Watchlist — append-only, index-addressable registry of monitored users.
 *
 * Insertion order is first-deposit order and drives every accrual and
 * conversion pass. A user is never inserted twice and never removed.
 */

import type { UserId } from "../shared/identifiers.js";

/** Read side handed to engines and observers. */
export interface ReadonlyWatchlist extends Iterable<UserId> {
	readonly size: number;
	at(index: number): UserId | undefined;
	has(user: UserId): boolean;
	toArray(): readonly UserId[];
}

export class Watchlist implements ReadonlyWatchlist {
	private readonly order: UserId[] = [];
	private readonly members = new Set<UserId>();

	/** @returns false when the user was already present */
	add(user: UserId): boolean {
		if (this.members.has(user)) return false;
		this.members.add(user);
		this.order.push(user);
		return true;
	}

	has(user: UserId): boolean {
		return this.members.has(user);
	}

	at(index: number): UserId | undefined {
		if (!Number.isInteger(index) || index < 0) return undefined;
		return this.order[index];
	}

	get size(): number {
		return this.order.length;
	}

	toArray(): readonly UserId[] {
		return [...this.order];
	}

	/** Iterates a copy, so additions during a pass are picked up next pass. */
	[Symbol.iterator](): Iterator<UserId> {
		return this.toArray()[Symbol.iterator]();
	}
}
