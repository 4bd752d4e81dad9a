/**
 * Status Module - Error Types
 */
import { type StoreError, formatStoreError } from "../store/errors.js";

export type StatusError =
  | { readonly type: "STORE_ERROR"; readonly message: string; readonly cause: StoreError }
  | { readonly type: "WRITE_FAILED"; readonly message: string; readonly path: string };

export function statusStoreError(cause: StoreError): StatusError {
  return { type: "STORE_ERROR", message: formatStoreError(cause), cause };
}

export function writeFailed(path: string, reason: string): StatusError {
  return { type: "WRITE_FAILED", message: `Could not write ${path}: ${reason}`, path };
}

export function formatStatusError(error: StatusError): string {
  return error.message;
}
