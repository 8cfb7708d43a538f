/**
 * Registry Module - Pure Transformations
 *
 * Validation of the doors file contents.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";
import type { ZodIssue } from "zod";

import { resolveDoorTiming } from "../door/index.js";
import { type RegistryError, configInvalid } from "./errors.js";
import { DoorsFileSchema, type ResolvedDoor } from "./schema.js";

/**
 * "doors.0.dayDelayMinutes: Number must be less than or equal to 240"
 */
export function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Validate parsed doors file data and resolve every door's timing.
 */
export function parseDoorsFile(
  data: unknown,
  path: string,
): Result<ReadonlyArray<ResolvedDoor>, RegistryError> {
  const parsed = DoorsFileSchema.safeParse(data);
  if (!parsed.success) {
    return err(configInvalid(path, parsed.error.issues.map(formatIssue)));
  }

  const doors: ResolvedDoor[] = [];
  for (const config of parsed.data.doors) {
    const timing = resolveDoorTiming(config);
    if (timing.isErr()) {
      return err(configInvalid(path, [`${config.doorId}: ${timing.error.message}`]));
    }
    doors.push({ config, timing: timing.value });
  }

  return ok(doors);
}
