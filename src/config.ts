import type { Commitment } from "@solana/kit";
import { AltStoreError, StoreErrorCode } from "./errors";

/**
 * The RPC endpoint used when no URL is given to `createRpcAccountDataSource`.
 */
export const DEFAULT_RPC_URL = "https://api.mainnet-beta.solana.com";

/**
 * Maximum number of accounts a single `getMultipleAccounts` call accepts.
 */
export const DEFAULT_MAX_BATCH_SIZE = 100;

/**
 * Default settings for fetching lookup table accounts.
 */
export const DEFAULT_FETCH_CONFIG: FetchConfig = {
  commitment: "finalized",
  maxBatchSize: DEFAULT_MAX_BATCH_SIZE,
  timeoutInSeconds: 10,
};

/**
 * Configuration for fetching lookup table accounts from an RPC.
 *
 * @property {Commitment} commitment - The commitment level the accounts are read at.
 * @property {number} maxBatchSize - Maximum number of addresses sent in one request.
 * @property {number} timeoutInSeconds - Time before a single request is aborted.
 */
export type FetchConfig = {
  commitment: Commitment;
  maxBatchSize: number;
  timeoutInSeconds: number;
};

/**
 * Merges the given overrides into the default fetch configuration.
 *
 * @param {Partial<FetchConfig>} [overrides] - Settings that replace the defaults.
 * @throws {AltStoreError} If the batch size or the timeout is not a positive number.
 * @returns {FetchConfig} The resulting configuration.
 *
 * @example
 * ```ts
 * const config = resolveFetchConfig({ commitment: "confirmed" });
 * ```
 */
export function resolveFetchConfig(
  overrides: Partial<FetchConfig> = {},
): FetchConfig {
  const config: FetchConfig = { ...DEFAULT_FETCH_CONFIG, ...overrides };
  if (!Number.isInteger(config.maxBatchSize) || config.maxBatchSize <= 0) {
    throw new AltStoreError(
      `maxBatchSize must be a positive integer, got ${config.maxBatchSize}`,
      StoreErrorCode.InvalidConfig,
    );
  }
  if (!(config.timeoutInSeconds > 0)) {
    throw new AltStoreError(
      `timeoutInSeconds must be positive, got ${config.timeoutInSeconds}`,
      StoreErrorCode.InvalidConfig,
    );
  }
  return config;
}
