export * from "./config";
export * from "./errors";
export * from "./dataSource";
export * from "./lookupTable";
export * from "./store";
export * from "./resolver";

export { rpcFromUrl } from "./compatibility";
export { decodeStoreEntries, encodeStoreEntries } from "./storeCodec";

export type { FetchConfig } from "./config";
export type { AccountDataReader, UpdateMode } from "./store";
export type { LookupRequest, ResolvedAddresses } from "./resolver";
