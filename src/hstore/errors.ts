// src/hstore/errors.ts

export type HstoreErrorCode =
  | "InvalidEntryCount"
  | "InvalidKeyLength"
  | "TruncatedBuffer"
  | "InvalidUtf8"
  | "InvalidBufferSize"
  | "EmptyLiteral"
  | "InvalidText";

export class HstoreError extends Error {
  public readonly code: HstoreErrorCode;

  public constructor(code: HstoreErrorCode, msg?: string) {
    super(msg ?? code);
    this.code = code;
    this.name = "HstoreError";
  }
}

export function isHstoreError(e: unknown, code?: HstoreErrorCode): e is HstoreError {
  return e instanceof HstoreError && (code === undefined || e.code === code);
}

export type WarnFn = (msg: string) => void;
