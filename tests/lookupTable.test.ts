import { describe, it } from "vitest";
import assert from "assert";
import { decodeLookupTable, LOOKUP_TABLE_META_SIZE } from "../src/lookupTable";
import { lookupTableData, testAddress, U64_MAX } from "./utils/fixtures";

describe("decodeLookupTable", () => {
  const addresses = [testAddress(1), testAddress(2), testAddress(3)];

  it("Should decode the header and the addresses in order", () => {
    const data = lookupTableData(addresses, {
      lastExtendedSlot: BigInt(250),
      lastExtendedSlotStartIndex: 1,
      authority: testAddress(9),
    });

    const result = decodeLookupTable(data);

    assert.deepStrictEqual(result, {
      type: "ok",
      table: {
        deactivationSlot: U64_MAX,
        lastExtendedSlot: BigInt(250),
        lastExtendedSlotStartIndex: 1,
        authority: testAddress(9),
        addresses,
      },
    });
  });

  it("Should decode a frozen table without authority", () => {
    const result = decodeLookupTable(lookupTableData(addresses));
    assert.ok(result.type === "ok");
    assert.strictEqual(result.table.authority, null);
  });

  it("Should decode a table without addresses", () => {
    const data = lookupTableData([]);
    assert.strictEqual(data.length, LOOKUP_TABLE_META_SIZE);

    const result = decodeLookupTable(data);
    assert.ok(result.type === "ok");
    assert.deepStrictEqual(result.table.addresses, []);
  });

  it("Should not modify the input", () => {
    const data = lookupTableData(addresses, { authority: testAddress(9) });
    const copy = Uint8Array.from(data);
    decodeLookupTable(data);
    assert.deepStrictEqual(data, copy);
  });

  it("Should reject data shorter than the header", () => {
    const data = lookupTableData([]).subarray(0, LOOKUP_TABLE_META_SIZE - 1);
    assert.deepStrictEqual(decodeLookupTable(data), {
      type: "error",
      reason: "TooShort",
    });
  });

  it("Should reject an uninitialized account", () => {
    const data = lookupTableData(addresses, { discriminator: 0 });
    assert.deepStrictEqual(decodeLookupTable(data), {
      type: "error",
      reason: "Uninitialized",
    });
  });

  it("Should reject an unknown discriminator", () => {
    const data = lookupTableData(addresses, { discriminator: 2 });
    assert.deepStrictEqual(decodeLookupTable(data), {
      type: "error",
      reason: "UnknownDiscriminator",
    });
  });

  it("Should reject an invalid authority option", () => {
    const data = lookupTableData(addresses);
    data[21] = 2;
    assert.deepStrictEqual(decodeLookupTable(data), {
      type: "error",
      reason: "InvalidAuthorityOption",
    });
  });

  it("Should reject an address list that is not a multiple of 32 bytes", () => {
    const table = lookupTableData(addresses);
    const data = new Uint8Array(table.length + 5);
    data.set(table);
    assert.deepStrictEqual(decodeLookupTable(data), {
      type: "error",
      reason: "MisalignedAddresses",
    });
  });
});
