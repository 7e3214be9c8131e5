/**
 * Bounded in-memory journal for tests and paper runs.
 * Oldest entries are dropped once `maxEntries` is exceeded.
 */

import type { Journal, JournalEntry, JournalEntryType } from "./journal.js";

export interface MemoryJournalConfig {
	readonly maxEntries?: number;
}

export class MemoryJournal implements Journal {
	private readonly store: JournalEntry[] = [];
	private readonly maxEntries: number;

	constructor(config?: MemoryJournalConfig) {
		this.maxEntries = config?.maxEntries ?? Number.POSITIVE_INFINITY;
	}

	async record(entry: JournalEntry): Promise<void> {
		this.store.push(entry);
		const excess = this.store.length - this.maxEntries;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** Shallow copy of the retained entries, oldest first. */
	entries(): JournalEntry[] {
		return [...this.store];
	}

	ofType<K extends JournalEntryType>(type: K): Extract<JournalEntry, { type: K }>[] {
		return this.store.filter((e): e is Extract<JournalEntry, { type: K }> => e.type === type);
	}

	clear(): void {
		this.store.length = 0;
	}

	async flush(): Promise<void> {}

	get size(): number {
		return this.store.length;
	}
}
