/**
 * Store Module - Schemas and Types
 *
 * On-disk shape of the persisted per-door settings.
 */
import { z } from "zod";

import { DoorSettingsSchema } from "../door/index.js";

export const StateFileSchema = z.object({
  doors: z.record(z.string(), DoorSettingsSchema).default({}),
});

export type StateFile = z.infer<typeof StateFileSchema>;

export const EMPTY_STATE: StateFile = { doors: {} };
