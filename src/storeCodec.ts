import type { Address } from "@solana/kit";
import {
  addDecoderSizePrefix,
  addEncoderSizePrefix,
  getAddressDecoder,
  getAddressEncoder,
  getBytesDecoder,
  getBytesEncoder,
  getMapDecoder,
  getMapEncoder,
  getU64Decoder,
  getU64Encoder,
} from "@solana/kit";
import { AltStoreError, StoreErrorCode } from "./errors";

// u64 entry count, then per entry: 32 address bytes, u64 data length, data.
const storeEntriesEncoder = getMapEncoder(
  getAddressEncoder(),
  addEncoderSizePrefix(getBytesEncoder(), getU64Encoder()),
  { size: getU64Encoder() },
);

const storeEntriesDecoder = getMapDecoder(
  getAddressDecoder(),
  addDecoderSizePrefix(getBytesDecoder(), getU64Decoder()),
  { size: getU64Decoder() },
);

export function encodeStoreEntries(
  entries: ReadonlyMap<Address, Uint8Array>,
): Uint8Array {
  return new Uint8Array(storeEntriesEncoder.encode(new Map(entries)));
}

/**
 * Decode the persisted store content.
 *
 * @throws {AltStoreError} `StoreCorrupt` if the bytes are empty, truncated or followed by trailing data.
 */
export function decodeStoreEntries(bytes: Uint8Array): Map<Address, Uint8Array> {
  // an empty store still encodes its entry count
  if (bytes.length === 0) {
    throw new AltStoreError(
      "store content is empty",
      StoreErrorCode.StoreCorrupt,
    );
  }

  let decoded: Map<Address, Uint8Array>;
  let offset: number;
  try {
    const [entries, endOffset] = storeEntriesDecoder.read(bytes, 0);
    decoded = new Map();
    for (const [address, data] of entries) {
      decoded.set(address, new Uint8Array(data));
    }
    offset = endOffset;
  } catch (e) {
    throw new AltStoreError(
      `unable to decode store content: ${e}`,
      StoreErrorCode.StoreCorrupt,
      e,
    );
  }

  if (offset !== bytes.length) {
    throw new AltStoreError(
      `unexpected ${bytes.length - offset} trailing byte(s) in store content`,
      StoreErrorCode.StoreCorrupt,
    );
  }
  return decoded;
}
