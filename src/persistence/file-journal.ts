/**
 * FileJournal — JSON-lines journal on local disk.
 *
 * Writes are serialised through a promise queue so lines never interleave.
 * Optional size-based rotation keeps `maxFiles` numbered predecessors
 * (`journal.jsonl.1` is the newest). restore() reports unreadable lines
 * instead of dropping them.
 */

import { appendFile, readFile, rename, stat } from "node:fs/promises";
import { validate } from "../lib/validation/index.js";
import { type Journal, type JournalEntry, JournalEntrySchema } from "./journal.js";

export interface FileJournalConfig {
	readonly filePath: string;
	readonly maxFileSizeBytes?: number;
	/** Rotated files kept; defaults to 5 when rotation is enabled. */
	readonly maxFiles?: number;
}

/** A line that is not JSON or not a journal entry. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
	readonly reason: string;
}

export interface RestoreResult {
	readonly entries: readonly JournalEntry[];
	readonly corruptLines: readonly CorruptLine[];
}

const MAX_WRITE_ERRORS = 10;

export class FileJournal implements Journal {
	private readonly config: FileJournalConfig;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly recentWriteErrors: Error[] = [];

	private constructor(config: FileJournalConfig) {
		this.config = config;
	}

	static create(config: FileJournalConfig): FileJournal {
		return new FileJournal(config);
	}

	private get filePath(): string {
		return this.config.filePath;
	}

	private get maxFiles(): number {
		if (this.config.maxFiles !== undefined) return this.config.maxFiles;
		return this.config.maxFileSizeBytes !== undefined ? 5 : 0;
	}

	/** @throws Error when the journal is closed or the append fails */
	async record(entry: JournalEntry): Promise<void> {
		if (this.closed) {
			throw new Error("FileJournal is closed");
		}
		const line = `${JSON.stringify(entry)}\n`;
		const write = (): Promise<void> => this.writeOnce(line);
		// a failed append is reported to its own caller; later writes still run
		this.writeQueue = this.writeQueue.then(write, write);
		await this.writeQueue;
	}

	async restore(): Promise<RestoreResult> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				return { entries: [], corruptLines: [] };
			}
			throw e;
		}

		const entries: JournalEntry[] = [];
		const corruptLines: CorruptLine[] = [];
		const lines = content.split("\n");

		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) continue;
			const raw = trimmed.slice(0, 200);

			let json: unknown;
			try {
				json = JSON.parse(trimmed);
			} catch {
				corruptLines.push({ lineNumber: i + 1, raw, reason: "invalid JSON" });
				continue;
			}
			const parsed = validate(JournalEntrySchema, json, "journal entry");
			if (parsed.ok) {
				entries.push(parsed.value);
			} else {
				corruptLines.push({ lineNumber: i + 1, raw, reason: parsed.error.message });
			}
		}

		return { entries, corruptLines };
	}

	/** Rejects further records once pending writes have drained. */
	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	/** Waits for queued writes. Their failures were already reported to record(). */
	async flush(): Promise<void> {
		await this.writeQueue.then(
			() => undefined,
			() => undefined,
		);
	}

	/** Up to the last ten append failures. */
	writeErrors(): readonly Error[] {
		return [...this.recentWriteErrors];
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			if (this.config.maxFileSizeBytes !== undefined && this.config.maxFileSizeBytes > 0) {
				await this.rotateIfNeeded(this.config.maxFileSizeBytes);
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (e: unknown) {
			const code = isNodeError(e) ? e.code : "UNKNOWN";
			const msg = e instanceof Error ? e.message : String(e);
			const error = new Error(`FileJournal write to ${this.filePath} failed: [${code}] ${msg}`, {
				cause: e,
			});
			this.recentWriteErrors.push(error);
			if (this.recentWriteErrors.length > MAX_WRITE_ERRORS) {
				this.recentWriteErrors.shift();
			}
			throw error;
		}
	}

	private async rotateIfNeeded(maxSize: number): Promise<void> {
		try {
			const stats = await stat(this.filePath);
			if (stats.size < maxSize) return;
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return;
			throw e;
		}
		await this.rotate();
	}

	private async rotate(): Promise<void> {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfExists(this.filePath, `${this.filePath}.1`);
	}
}

async function renameIfExists(src: string, dst: string): Promise<void> {
	try {
		await rename(src, dst);
	} catch (e: unknown) {
		if (!isNodeError(e) || e.code !== "ENOENT") throw e;
	}
}

function isNodeError(e: unknown): e is NodeJS.ErrnoException {
	return e instanceof Error && "code" in e;
}
