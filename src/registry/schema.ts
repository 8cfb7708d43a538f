/**
 * Registry Module - Schemas and Types
 *
 * Shape of the doors file and the resolved door definitions.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import { type DoorConfig, DoorConfigSchema, type DoorTiming } from "../door/index.js";

/**
 * Doors file: every door this process manages.
 *
 * doorIds must be unique, and a topic may belong to one door only.
 */
export const DoorsFileSchema = z
  .object({
    doors: z.array(DoorConfigSchema).min(1, "At least one door is required"),
  })
  .superRefine((file, ctx) => {
    const ids = new Set<string>();
    const topics = new Map<string, string>();

    file.doors.forEach((door, index) => {
      if (ids.has(door.doorId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["doors", index, "doorId"],
          message: `Duplicate doorId: ${door.doorId}`,
        });
      }
      ids.add(door.doorId);

      const refs = door.sensorRef === undefined ? [door.lockRef] : [door.lockRef, door.sensorRef];
      for (const topic of refs) {
        const owner = topics.get(topic);
        if (owner !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["doors", index],
            message: `Topic ${topic} is already used by door ${owner}`,
          });
        }
        topics.set(topic, door.doorId);
      }
    });
  });

export type DoorsFile = z.infer<typeof DoorsFileSchema>;

/**
 * A validated door with its timing resolved.
 */
export type ResolvedDoor = Readonly<{
  config: DoorConfig;
  timing: DoorTiming;
}>;
