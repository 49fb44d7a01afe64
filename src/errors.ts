export enum StoreErrorCode {
  FetchFailed = `FetchFailed`,
  StoreCorrupt = `StoreCorrupt`,
  PersistFailed = `PersistFailed`,
  InvalidConfig = `InvalidConfig`,
}

export enum ResolveErrorCode {
  TableNotFound = `TableNotFound`,
  InvalidTableData = `InvalidTableData`,
  IndexOutOfRange = `IndexOutOfRange`,
}

export type AltStoreErrorCode = StoreErrorCode | ResolveErrorCode;

export class AltStoreError extends Error {
  errorCode: AltStoreErrorCode;
  constructor(message: string, errorCode: AltStoreErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "AltStoreError";
    this.errorCode = errorCode;
  }

  public static isAltStoreErrorCode(
    e: unknown,
    code: AltStoreErrorCode,
  ): e is AltStoreError {
    return e instanceof AltStoreError && e.errorCode === code;
  }
}
