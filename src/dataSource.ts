import type { Address, GetMultipleAccountsApi, Rpc } from "@solana/kit";
import { fetchEncodedAccounts } from "@solana/kit";
import type { FetchConfig } from "./config";
import { DEFAULT_RPC_URL, resolveFetchConfig } from "./config";
import { rpcFromUrl } from "./compatibility";
import { AltStoreError, StoreErrorCode } from "./errors";

/**
 * The raw data of an account, keyed by its address.
 */
export type AccountEntry = {
  address: Address;
  data: Uint8Array;
};

/**
 * A batched source of raw account data.
 *
 * Implementations return at most one entry per requested address and omit
 * addresses that have no account. The order of the returned entries is not
 * significant.
 */
export interface AccountDataSource {
  /**
   * Maximum number of addresses a single `fetch` call accepts.
   */
  readonly maxBatchSize: number;

  /**
   * Fetch the raw data of the given accounts.
   * @param addresses The account addresses to fetch. At most `maxBatchSize` entries.
   * @returns The entries for the accounts that exist.
   */
  fetch(addresses: readonly Address[]): Promise<AccountEntry[]>;
}

/**
 * Data source backed by the `getMultipleAccounts` RPC method.
 */
export class RpcAccountDataSource implements AccountDataSource {
  readonly maxBatchSize: number;
  private readonly config: FetchConfig;

  constructor(
    readonly rpc: Rpc<GetMultipleAccountsApi>,
    config?: Partial<FetchConfig>,
  ) {
    this.config = resolveFetchConfig(config);
    this.maxBatchSize = this.config.maxBatchSize;
  }

  async fetch(addresses: readonly Address[]): Promise<AccountEntry[]> {
    if (addresses.length === 0) {
      return [];
    }

    const abortController = new AbortController();
    const timeout = setTimeout(() => {
      abortController.abort(
        new Error(
          `getMultipleAccounts timeout after ${this.config.timeoutInSeconds}s`,
        ),
      );
    }, this.config.timeoutInSeconds * 1000);

    try {
      const accounts = await fetchEncodedAccounts(this.rpc, [...addresses], {
        abortSignal: abortController.signal,
        commitment: this.config.commitment,
      });
      const entries: AccountEntry[] = [];
      for (const account of accounts) {
        if (account.exists) {
          entries.push({
            address: account.address,
            data: new Uint8Array(account.data),
          });
        }
      }
      return entries;
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Creates a data source reading from the given RPC endpoint.
 *
 * @param {string} [url] - The RPC endpoint URL. Defaults to mainnet-beta.
 * @param {Partial<FetchConfig>} [config] - Overrides of the default fetch settings.
 * @returns {RpcAccountDataSource}
 *
 * @example
 * ```ts
 * const dataSource = createRpcAccountDataSource("https://api.devnet.solana.com", {
 *   commitment: "confirmed",
 * });
 * ```
 */
export function createRpcAccountDataSource(
  url: string = DEFAULT_RPC_URL,
  config?: Partial<FetchConfig>,
): RpcAccountDataSource {
  const resolved = resolveFetchConfig(config);
  return new RpcAccountDataSource(
    rpcFromUrl(url, resolved.commitment),
    resolved,
  );
}

/**
 * Fetch any number of accounts from a data source, splitting the request into
 * batches of at most `dataSource.maxBatchSize` addresses.
 *
 * @throws {AltStoreError} `FetchFailed` if any batch fails. No partial result is returned.
 */
export async function fetchAccountsInChunks(
  dataSource: AccountDataSource,
  addresses: readonly Address[],
): Promise<AccountEntry[]> {
  if (addresses.length === 0) {
    return [];
  }

  const chunkSize = dataSource.maxBatchSize;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new AltStoreError(
      `data source maxBatchSize must be a positive integer, got ${chunkSize}`,
      StoreErrorCode.InvalidConfig,
    );
  }
  const chunks: Address[][] = [];
  for (let i = 0; i < addresses.length; i += chunkSize) {
    chunks.push(addresses.slice(i, i + chunkSize));
  }

  try {
    const results = await Promise.all(
      chunks.map((chunk) => dataSource.fetch(chunk)),
    );
    return results.flat();
  } catch (e) {
    throw new AltStoreError(
      `failed to fetch ${addresses.length} lookup table account(s): ${e}`,
      StoreErrorCode.FetchFailed,
      e,
    );
  }
}
