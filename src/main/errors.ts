export type LibraryErrorCode =
  | "StoreUnavailable"
  | "NotFound"
  | "InstallerFailed"
  | "ValidationFailed"
  | "ManifestWriteFailed"
  | "FilesystemError"
  | "ConfigInvalid";

export type LibraryErrorDetails = {
  appid?: number;
  path?: string;
  cause?: unknown;
};

export class LibraryError extends Error {
  readonly code: LibraryErrorCode;
  readonly appid?: number;
  readonly path?: string;

  constructor(code: LibraryErrorCode, message: string, details: LibraryErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "LibraryError";
    this.code = code;
    this.appid = details.appid;
    this.path = details.path;
  }
}

export function isLibraryError(value: unknown, code?: LibraryErrorCode): value is LibraryError {
  if (!(value instanceof LibraryError)) return false;
  return code === undefined || value.code === code;
}

export function describeError(value: unknown): string {
  if (value instanceof LibraryError) return `${value.code}: ${value.message}`;
  if (value instanceof Error && value.message) return value.message;
  return String(value);
}
