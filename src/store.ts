import type { Address } from "@solana/kit";
import { readFile } from "fs/promises";
import PQueue from "p-queue";
import type { AccountDataSource } from "./dataSource";
import { fetchAccountsInChunks } from "./dataSource";
import { AltStoreError, StoreErrorCode } from "./errors";
import { atomicWriteFile, isNotFoundError } from "./fileUtils";
import { decodeStoreEntries, encodeStoreEntries } from "./storeCodec";

/**
 * How `update` handles addresses that are already in the store.
 * - `append`: only fetch addresses that are not in the store yet (default).
 * - `overwrite`: fetch every address, replacing the stored data.
 */
export type UpdateMode = "append" | "overwrite";

/**
 * Read-only access to raw account data by address.
 */
export interface AccountDataReader {
  get(address: Address): Uint8Array | undefined;
}

/**
 * Persistent cache of address lookup table account data.
 *
 * The whole store is kept in memory and written to a single file after every
 * update that fetched accounts. Use `LookupTableStore.loadOrCreate` to obtain
 * an instance.
 */
export class LookupTableStore implements AccountDataReader {
  // merges and writes run one at a time
  private readonly persistQueue = new PQueue({ concurrency: 1 });

  private constructor(
    readonly path: string,
    private readonly dataSource: AccountDataSource,
    private readonly entries: Map<Address, Uint8Array>,
  ) {}

  /**
   * Load the store persisted at `path`, or create an empty one if the file does not exist.
   *
   * @param path The backing file.
   * @param dataSource The source `update` fetches missing accounts from.
   * @throws {AltStoreError} `StoreCorrupt` if the file cannot be read or decoded,
   * `PersistFailed` if a new file cannot be written.
   */
  static async loadOrCreate(
    path: string,
    dataSource: AccountDataSource,
  ): Promise<LookupTableStore> {
    let content: Uint8Array;
    try {
      content = new Uint8Array(await readFile(path));
    } catch (e) {
      if (!isNotFoundError(e)) {
        throw new AltStoreError(
          `unable to read store at ${path}: ${e}`,
          StoreErrorCode.StoreCorrupt,
          e,
        );
      }
      const store = new LookupTableStore(path, dataSource, new Map());
      await store.save();
      return store;
    }

    return new LookupTableStore(path, dataSource, decodeStoreEntries(content));
  }

  get size(): number {
    return this.entries.size;
  }

  contains(address: Address): boolean {
    return this.entries.has(address);
  }

  /**
   * The cached data of an account. The returned array is a copy.
   */
  get(address: Address): Uint8Array | undefined {
    const data = this.entries.get(address);
    return data && Uint8Array.from(data);
  }

  keys(): Address[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Fetch and store the account data for the given lookup table addresses.
   *
   * Addresses the data source does not return are skipped. Nothing is fetched
   * or written when there is nothing to fetch.
   *
   * @param addresses The lookup table addresses to make available.
   * @param mode Whether addresses already in the store are fetched again.
   * @throws {AltStoreError} `FetchFailed` if the data source fails, in which case
   * the store is left unchanged, or `PersistFailed` if the file cannot be
   * written, in which case the in-memory store is ahead of the file.
   */
  async update(
    addresses: readonly Address[],
    mode: UpdateMode = "append",
  ): Promise<void> {
    const unique = Array.from(new Set(addresses));
    const toFetch =
      mode === "overwrite"
        ? unique
        : unique.filter((address) => !this.contains(address));

    if (toFetch.length === 0) {
      return;
    }

    const fetched = await fetchAccountsInChunks(this.dataSource, toFetch);

    await this.persistQueue.add(async () => {
      for (const { address, data } of fetched) {
        this.insert(address, data);
      }
      await this.write();
    });

    const found = new Set(fetched.map(({ address }) => address));
    const missing = toFetch.filter((address) => !found.has(address));
    if (missing.length > 0) {
      console.warn(
        `${missing.length} lookup table account(s) not found: ${missing.join(", ")}`,
      );
    }
  }

  /**
   * Write the store to its backing file.
   *
   * @throws {AltStoreError} `PersistFailed` if the file cannot be written.
   */
  async save(): Promise<void> {
    await this.persistQueue.add(() => this.write());
  }

  private insert(address: Address, data: Uint8Array) {
    this.entries.set(address, Uint8Array.from(data));
  }

  private async write(): Promise<void> {
    try {
      await atomicWriteFile(this.path, encodeStoreEntries(this.entries));
    } catch (e) {
      throw new AltStoreError(
        `unable to write store to ${this.path}: ${e}`,
        StoreErrorCode.PersistFailed,
        e,
      );
    }
  }
}
