/**
 * Configuration module exports
 */

export * from "./loader";
export * from "./defaults";
export { validateConfig, toConfigError } from "./validator";
export { ConfigFileSchema, ScanConfigSchema } from "./schema";
export type { ConfigFileInput, ConfigInput } from "./schema";
