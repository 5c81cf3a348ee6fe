/**
 * Configuration validator
 */

import { ZodError } from 'zod';
import type { ScanConfig } from '@route-conventions/types';
import { ScanConfigSchema } from './schema';

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): ScanConfig {
  try {
    return ScanConfigSchema.parse(config);
  } catch (error) {
    throw toConfigError(error);
  }
}

/**
 * Turn a zod failure into a readable configuration error
 */
export function toConfigError(error: unknown): Error {
  if (error instanceof ZodError) {
    const messages = error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    }).join('\n');

    return new Error(
      `Invalid configuration:\n${messages}\n\n` +
      `Please check your config file and ensure all fields match the expected schema.`
    );
  }
  return new Error(`Configuration validation failed: ${error instanceof Error ? error.message : String(error)}`);
}
