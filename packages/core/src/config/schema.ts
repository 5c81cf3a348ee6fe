/**
 * Configuration schema using Zod
 */

import { z } from "zod";

// Schema for config file (rootDir is not in config files, it's set by CLI)
export const ConfigFileSchema = z.object({
  /** Directory holding action files, relative to the project root */
  actionsDir: z.string().min(1, "actionsDir must be a non-empty string").optional(),
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  /** Base URL used when printing absolute URLs */
  baseUrl: z.string().url().optional(),
});

// Full schema for final ScanConfig (includes rootDir)
export const ScanConfigSchema = ConfigFileSchema.extend({
  rootDir: z.string().min(1, "rootDir must be a non-empty string"),
  actionsDir: z.string().min(1, "actionsDir must be a non-empty string"),
});

export type ConfigInput = z.infer<typeof ScanConfigSchema>;
export type ConfigFileInput = z.infer<typeof ConfigFileSchema>;
