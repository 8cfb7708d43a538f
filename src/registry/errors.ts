/**
 * Registry Module - Error Types
 *
 * Typed error unions for loading the doors file.
 * Errors are values, not exceptions.
 */

export type RegistryError =
  | {
      readonly type: "CONFIG_READ_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONFIG_INVALID";
      readonly path: string;
      readonly issues: ReadonlyArray<string>;
      readonly message: string;
    };

/**
 * Create a CONFIG_READ_FAILED error.
 */
export function configReadFailed(
  path: string,
  message: string,
  cause?: Error,
): RegistryError {
  if (cause) {
    return { type: "CONFIG_READ_FAILED", path, message, cause };
  }
  return { type: "CONFIG_READ_FAILED", path, message };
}

/**
 * Create a CONFIG_INVALID error.
 */
export function configInvalid(
  path: string,
  issues: ReadonlyArray<string>,
): RegistryError {
  return {
    type: "CONFIG_INVALID",
    path,
    issues: [...issues],
    message: issues.join("; "),
  };
}

/**
 * Format a RegistryError for logging.
 */
export function formatRegistryError(error: RegistryError): string {
  switch (error.type) {
    case "CONFIG_READ_FAILED":
      return `Could not read doors file ${error.path}: ${error.message}`;
    case "CONFIG_INVALID":
      return `Invalid doors file ${error.path}: ${error.message}`;
  }
}
