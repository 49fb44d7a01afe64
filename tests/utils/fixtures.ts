import type { Address } from "@solana/kit";
import { getAddressDecoder, getAddressEncoder } from "@solana/kit";
import { LOOKUP_TABLE_META_SIZE } from "../../src/lookupTable";

export const U64_MAX = BigInt("18446744073709551615");

/**
 * A deterministic address whose 32 bytes all equal `seed`.
 */
export function testAddress(seed: number): Address {
  return getAddressDecoder().decode(new Uint8Array(32).fill(seed));
}

export type LookupTableDataOptions = {
  discriminator?: number;
  deactivationSlot?: bigint;
  lastExtendedSlot?: bigint;
  lastExtendedSlotStartIndex?: number;
  authority?: Address | null;
};

/**
 * Builds the account data of an address lookup table holding `addresses`.
 */
export function lookupTableData(
  addresses: Address[],
  options: LookupTableDataOptions = {},
): Uint8Array {
  const data = new Uint8Array(LOOKUP_TABLE_META_SIZE + addresses.length * 32);
  const view = new DataView(data.buffer);
  view.setUint32(0, options.discriminator ?? 1, true);
  view.setBigUint64(4, options.deactivationSlot ?? U64_MAX, true);
  view.setBigUint64(12, options.lastExtendedSlot ?? BigInt(0), true);
  data[20] = options.lastExtendedSlotStartIndex ?? 0;
  const authority = options.authority ?? null;
  if (authority) {
    data[21] = 1;
    data.set(getAddressEncoder().encode(authority), 22);
  }
  addresses.forEach((address, index) => {
    data.set(
      getAddressEncoder().encode(address),
      LOOKUP_TABLE_META_SIZE + index * 32,
    );
  });
  return data;
}
