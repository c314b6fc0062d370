export type WardenErrorMetaData = Record<string, string | number | null>;

/**
 * Generic error with attached metadata. The `type.code` doubles as message when none is given.
 */
export class WardenError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): WardenErrorMetaData {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): WardenErrorMetaData {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}

/**
 * Coerce a thrown value into an Error, keeping Error instances as is
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
