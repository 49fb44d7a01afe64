import type { Address } from "@solana/kit";
import { AltStoreError, ResolveErrorCode } from "./errors";
import type { LookupTable } from "./lookupTable";
import { decodeLookupTable } from "./lookupTable";
import type { AccountDataReader } from "./store";

/**
 * An address table lookup of a v0 transaction message.
 */
export type LookupRequest = Readonly<{
  lookupTableAddress: Address;
  writableIndexes: readonly number[];
  readonlyIndexes: readonly number[];
}>;

/**
 * The addresses loaded for a list of lookups. `writable` and `readonly` hold
 * the addresses in lookup order, then index order.
 */
export type ResolvedAddresses = {
  writable: Address[];
  readonly: Address[];
};

/**
 * Resolves address table lookups against cached lookup table accounts.
 * It never fetches anything: tables must be loaded into the store beforehand.
 */
export class AddressResolver {
  constructor(private readonly reader: AccountDataReader) {}

  /**
   * Decode the cached lookup table at the given address.
   *
   * @throws {AltStoreError} `TableNotFound` or `InvalidTableData`.
   */
  getLookupTable(lookupTableAddress: Address): LookupTable {
    const data = this.reader.get(lookupTableAddress);
    if (!data) {
      throw new AltStoreError(
        `lookup table ${lookupTableAddress} not found`,
        ResolveErrorCode.TableNotFound,
      );
    }

    const result = decodeLookupTable(data);
    if (result.type === "error") {
      throw new AltStoreError(
        `invalid lookup table data for ${lookupTableAddress}: ${result.reason}`,
        ResolveErrorCode.InvalidTableData,
      );
    }
    return result.table;
  }

  /**
   * Load the writable and readonly addresses referenced by the given lookups.
   * The first failing lookup aborts the whole call.
   *
   * @throws {AltStoreError} `TableNotFound`, `InvalidTableData` or `IndexOutOfRange`.
   */
  loadAddresses(lookups: readonly LookupRequest[]): ResolvedAddresses {
    const writable: Address[] = [];
    const readonly: Address[] = [];

    for (const lookup of lookups) {
      const table = this.getLookupTable(lookup.lookupTableAddress);
      for (const index of lookup.writableIndexes) {
        writable.push(addressAt(table, lookup.lookupTableAddress, index));
      }
      for (const index of lookup.readonlyIndexes) {
        readonly.push(addressAt(table, lookup.lookupTableAddress, index));
      }
    }

    return { writable, readonly };
  }

  /**
   * Build the map of lookup table address to contained addresses used when
   * decompiling a transaction message.
   *
   * @throws {AltStoreError} `TableNotFound` or `InvalidTableData`.
   */
  getAddressesByLookupTableAddress(
    lookupTableAddresses: readonly Address[],
  ): Record<Address, Address[]> {
    const result: Record<Address, Address[]> = {};
    for (const lookupTableAddress of lookupTableAddresses) {
      result[lookupTableAddress] =
        this.getLookupTable(lookupTableAddress).addresses;
    }
    return result;
  }
}

function addressAt(
  table: LookupTable,
  lookupTableAddress: Address,
  index: number,
): Address {
  if (!Number.isInteger(index) || index < 0 || index >= table.addresses.length) {
    throw new AltStoreError(
      `index ${index} out of range for lookup table ${lookupTableAddress} with ${table.addresses.length} address(es)`,
      ResolveErrorCode.IndexOutOfRange,
    );
  }
  return table.addresses[index];
}
