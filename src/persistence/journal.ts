/**
 * Journal — append-only audit trail of ledger-changing steps.
 *
 * Amounts are decimal strings so every entry survives JSON unchanged.
 * Entries read back from disk are checked against JournalEntrySchema.
 */

import { z } from "../lib/validation/index.js";

export interface Journal {
	record(entry: JournalEntry): Promise<void>;
	flush(): Promise<void>;
}

const amount = z.string().regex(/^-?\d+$/);

export const JournalEntrySchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("deposit"),
		user: z.string(),
		amount,
		depositTotal: amount,
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("order_configured"),
		user: z.string(),
		targetPrice: amount,
		conversionPercentage: z.number().int(),
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("accrual_pass"),
		status: z.enum(["noop", "applied", "partial"]),
		users: z.number().int(),
		contributed: amount,
		failures: z.number().int(),
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("conversion"),
		user: z.string(),
		amountIn: amount,
		amountOut: amount,
		price: amount,
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("conversion_failed"),
		user: z.string(),
		amountIn: amount,
		code: z.string(),
		message: z.string(),
		timestamp: z.number(),
	}),
	z.object({
		type: z.literal("error"),
		operation: z.string(),
		code: z.string(),
		message: z.string(),
		timestamp: z.number(),
	}),
]);

export type JournalEntry = z.infer<typeof JournalEntrySchema>;
export type JournalEntryType = JournalEntry["type"];
