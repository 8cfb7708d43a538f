/**
 * Registry Module - Public API
 */

// Types
export type { DoorsFile, ResolvedDoor } from "./schema.js";
export type { RegistryError } from "./errors.js";
export type { DoorRegistry, DoorRegistryDeps } from "./service.js";

export { DoorsFileSchema } from "./schema.js";
export { formatRegistryError } from "./errors.js";

// Service functions
export { createDoorRegistry, loadDoorsFile } from "./service.js";

// Pure transformations
export { parseDoorsFile } from "./transform.js";
