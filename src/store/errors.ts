/**
 * Store Module - Error Types
 *
 * Typed error unions for the state file.
 * Errors are values, not exceptions.
 */

export type StoreError =
  | {
      readonly type: "READ_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_CONTENT";
      readonly path: string;
      readonly message: string;
    };

/**
 * Create a READ_FAILED error.
 */
export function readFailed(path: string, message: string, cause?: Error): StoreError {
  if (cause) {
    return { type: "READ_FAILED", path, message, cause };
  }
  return { type: "READ_FAILED", path, message };
}

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(path: string, message: string, cause?: Error): StoreError {
  if (cause) {
    return { type: "WRITE_FAILED", path, message, cause };
  }
  return { type: "WRITE_FAILED", path, message };
}

/**
 * Create an INVALID_CONTENT error.
 */
export function invalidContent(path: string, message: string): StoreError {
  return { type: "INVALID_CONTENT", path, message };
}

/**
 * Format a StoreError for logging.
 */
export function formatStoreError(error: StoreError): string {
  switch (error.type) {
    case "READ_FAILED":
      return `Could not read ${error.path}: ${error.message}`;
    case "WRITE_FAILED":
      return `Could not write ${error.path}: ${error.message}`;
    case "INVALID_CONTENT":
      return `Invalid state file ${error.path}: ${error.message}`;
  }
}
