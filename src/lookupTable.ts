import type { Address } from "@solana/kit";
import {
  getAddressDecoder,
  getArrayDecoder,
  getStructDecoder,
  getU16Decoder,
  getU32Decoder,
  getU64Decoder,
  getU8Decoder,
} from "@solana/kit";

/**
 * Size of the lookup table header preceding the address list.
 */
export const LOOKUP_TABLE_META_SIZE = 56;

const ADDRESS_SIZE = 32;

const UNINITIALIZED_DISCRIMINATOR = 0;
const LOOKUP_TABLE_DISCRIMINATOR = 1;

/**
 * A decoded address lookup table account.
 */
export type LookupTable = {
  deactivationSlot: bigint;
  lastExtendedSlot: bigint;
  lastExtendedSlotStartIndex: number;
  authority: Address | null;
  addresses: Address[];
};

export type LookupTableDecodeErrorReason =
  | "TooShort"
  | "Uninitialized"
  | "UnknownDiscriminator"
  | "InvalidAuthorityOption"
  | "MisalignedAddresses";

export type LookupTableDecodeResult =
  | { type: "ok"; table: LookupTable }
  | { type: "error"; reason: LookupTableDecodeErrorReason };

const lookupTableMetaDecoder = getStructDecoder([
  ["discriminator", getU32Decoder()],
  ["deactivationSlot", getU64Decoder()],
  ["lastExtendedSlot", getU64Decoder()],
  ["lastExtendedSlotStartIndex", getU8Decoder()],
  ["authorityOption", getU8Decoder()],
  ["authority", getAddressDecoder()],
  ["padding", getU16Decoder()],
]);

const addressesDecoder = getArrayDecoder(getAddressDecoder(), {
  size: "remainder",
});

/**
 * Decode the data of an address lookup table account.
 *
 * @param data The raw account data. It is not modified.
 * @returns The decoded table, or the reason the data is not a valid lookup table.
 */
export function decodeLookupTable(data: Uint8Array): LookupTableDecodeResult {
  if (data.length < LOOKUP_TABLE_META_SIZE) {
    return { type: "error", reason: "TooShort" };
  }

  const [meta, offset] = lookupTableMetaDecoder.read(data, 0);
  if (meta.discriminator === UNINITIALIZED_DISCRIMINATOR) {
    return { type: "error", reason: "Uninitialized" };
  }
  if (meta.discriminator !== LOOKUP_TABLE_DISCRIMINATOR) {
    return { type: "error", reason: "UnknownDiscriminator" };
  }
  if (meta.authorityOption > 1) {
    return { type: "error", reason: "InvalidAuthorityOption" };
  }
  if ((data.length - offset) % ADDRESS_SIZE !== 0) {
    return { type: "error", reason: "MisalignedAddresses" };
  }

  const [addresses] = addressesDecoder.read(data, offset);
  return {
    type: "ok",
    table: {
      deactivationSlot: meta.deactivationSlot,
      lastExtendedSlot: meta.lastExtendedSlot,
      lastExtendedSlotStartIndex: meta.lastExtendedSlotStartIndex,
      authority: meta.authorityOption === 1 ? meta.authority : null,
      addresses,
    },
  };
}
