import type { z } from "zod";
import type { settingsSchema } from "../config/schema.js";

/** Fully defaulted installer settings. */
export type InstallerSettings = z.output<typeof settingsSchema>;
