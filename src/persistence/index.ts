export {
	type Journal,
	type JournalEntry,
	type JournalEntryType,
	JournalEntrySchema,
} from "./journal.js";
export { FileJournal } from "./file-journal.js";
export type { CorruptLine, FileJournalConfig, RestoreResult } from "./file-journal.js";
export { type MemoryJournalConfig, MemoryJournal } from "./memory-journal.js";
