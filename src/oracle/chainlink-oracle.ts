/**
 * ChainlinkPriceOracle — reads an AggregatorV3 feed through a ContractReader.
 *
 * Non-positive answers are rejected. With `maxStalenessMs` set, answers whose
 * `updatedAt` is older than the window are rejected as well.
 */

import type { ContractReader } from "../lib/ethereum/index.js";
import { z } from "../lib/validation/index.js";
import { ExternalFailureError, type HarvestError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { PriceOracle, RoundData } from "./types.js";

export interface ChainlinkOracleOptions {
	readonly decimals: number;
	/** Reject rounds older than this; unset disables the check. */
	readonly maxStalenessMs?: number;
	readonly clock?: Clock;
}

const RoundSchema = z.tuple([z.bigint(), z.bigint(), z.bigint(), z.bigint(), z.bigint()]);
const DecimalsSchema = z.number().int().min(0).max(36);

export class ChainlinkPriceOracle implements PriceOracle {
	readonly decimals: number;
	private readonly reader: ContractReader;
	private readonly maxStalenessMs: number | undefined;
	private readonly clock: Clock;

	private constructor(reader: ContractReader, options: ChainlinkOracleOptions) {
		this.reader = reader;
		this.decimals = options.decimals;
		this.maxStalenessMs = options.maxStalenessMs;
		this.clock = options.clock ?? SystemClock;
	}

	/** Use when the feed's decimals are already known. */
	static create(reader: ContractReader, options: ChainlinkOracleOptions): ChainlinkPriceOracle {
		return new ChainlinkPriceOracle(reader, options);
	}

	/** Reads `decimals()` from the feed before constructing the oracle. */
	static async connect(
		reader: ContractReader,
		options: Omit<ChainlinkOracleOptions, "decimals"> = {},
	): Promise<Result<ChainlinkPriceOracle, HarvestError>> {
		const decimals = await reader.read({ functionName: "decimals", schema: DecimalsSchema });
		if (!decimals.ok) return decimals;
		return ok(new ChainlinkPriceOracle(reader, { ...options, decimals: decimals.value }));
	}

	async latestRound(): Promise<Result<RoundData, HarvestError>> {
		const raw = await this.reader.read({ functionName: "latestRoundData", schema: RoundSchema });
		if (!raw.ok) return raw;
		const [roundId, answer, startedAt, updatedAt, answeredInRound] = raw.value;
		return ok({ roundId, answer, startedAt, updatedAt, answeredInRound });
	}

	async getPrice(): Promise<Result<bigint, HarvestError>> {
		const round = await this.latestRound();
		if (!round.ok) return round;
		const { answer, updatedAt, roundId } = round.value;

		if (answer <= 0n) {
			return err(
				new ExternalFailureError(
					"Oracle returned a non-positive answer",
					{ answer, roundId },
					"INVALID_ORACLE_ANSWER",
				),
			);
		}
		if (this.maxStalenessMs !== undefined) {
			const ageMs = this.clock.now() - Number(updatedAt) * 1_000;
			if (ageMs > this.maxStalenessMs) {
				return err(
					new ExternalFailureError(
						"Oracle answer is stale",
						{ ageMs, maxStalenessMs: this.maxStalenessMs, roundId },
						"STALE_ORACLE_ANSWER",
					),
				);
			}
		}
		return ok(answer);
	}
}
