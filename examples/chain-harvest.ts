/**
 * Chain Harvest Example
 *
 * Wires the engine to a live chain through viem:
 * - native balances read with eth_getBalance
 * - prices from a Chainlink ETH/USD aggregator
 * - conversions through a Uniswap V2 router, retried on transient failures
 * - the journal written to disk as JSON lines
 *
 * Environment: RPC_URL, KEEPER_KEY, FEED_ADDRESS, ROUTER_ADDRESS,
 * WETH_ADDRESS, STABLE_ADDRESS, plus optional HARVEST_* config overrides.
 */

import { createPublicClient, createWalletClient, http, isHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import {
	AGGREGATOR_V3_ABI,
	ChainlinkPriceOracle,
	ConfigError,
	FileJournal,
	HarvestService,
	UNISWAP_V2_ROUTER_ABI,
	UniswapV2Router,
	UpkeepRunner,
	createLogger,
	createViemBalanceReader,
	createViemReader,
	createViemWriter,
	loadConfig,
	parseUserId,
	unwrap,
	withRetry,
} from "../src/index.js";

function optional(name: string): string | undefined {
	return process.env[name];
}

function required(name: string): string {
	const value = optional(name);
	if (!value) throw new ConfigError(`${name} is not set`);
	return value;
}

async function main() {
	const config = unwrap(loadConfig());
	const logger = createLogger({ level: config.logLevel, redactPaths: ["rpcUrl"] });

	const key = required("KEEPER_KEY");
	if (!isHex(key)) throw new ConfigError("KEEPER_KEY must be 0x-prefixed hex");

	const transport = http(required("RPC_URL"));
	const publicClient = createPublicClient({ transport });
	const walletClient = createWalletClient({ account: privateKeyToAccount(key), transport });

	const oracle = unwrap(
		await ChainlinkPriceOracle.connect(
			createViemReader(publicClient, {
				address: required("FEED_ADDRESS"),
				abi: AGGREGATOR_V3_ABI,
			}),
			{ maxStalenessMs: 3_600_000 },
		),
	);

	const routerTarget = { address: required("ROUTER_ADDRESS"), abi: UNISWAP_V2_ROUTER_ABI };
	const uniswap = new UniswapV2Router(
		createViemReader(publicClient, routerTarget),
		createViemWriter(publicClient, walletClient, routerTarget),
		{
			weth: required("WETH_ADDRESS"),
			stable: required("STABLE_ADDRESS"),
			maxSlippageBps: config.maxSlippageBps,
			deadlineSeconds: config.swapDeadlineSeconds,
		},
	);

	const journal = FileJournal.create({
		filePath: "harvest-journal.jsonl",
		maxFileSizeBytes: 10_000_000,
	});

	const service = unwrap(
		HarvestService.create({
			oracle,
			router: withRetry(uniswap),
			balances: createViemBalanceReader(publicClient),
			config,
			journal,
			logger,
		}),
	);

	const depositor = optional("DEPOSITOR");
	if (depositor && parseUserId(depositor).ok) {
		unwrap(await service.deposit(depositor, "0.01"));
		unwrap(await service.configureOrder(depositor, "3000", 40));
	}

	const runner = new UpkeepRunner(service, {
		accrualIntervalMs: config.accrualIntervalMs,
		checkIntervalMs: config.checkIntervalMs,
		logger,
		onTick: (outcome) => {
			if (!outcome.skipped && outcome.conversion?.ok) {
				logger.info({ status: outcome.conversion.value.status }, "upkeep performed");
			}
		},
	});
	runner.start();

	process.once("SIGINT", () => {
		runner.stop();
		service.drain().then(
			() => process.exit(0),
			(e: unknown) => {
				logger.error({ err: e }, "drain failed");
				process.exit(1);
			},
		);
	});
}

main().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
