/**
 * The persistence layer could not read or write (locked, read-only, disk full, closed).
 * Fatal to the storage action only; callers may offer a retry.
 */
export class StorageUnavailable extends Error {
  readonly code = "STORAGE_UNAVAILABLE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageUnavailable";
  }
}

export function describeStorageError(error: unknown): string {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? ` (${error.code})` : "";
    return `${error.message}${code}`;
  }
  return String(error);
}
