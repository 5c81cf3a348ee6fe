/**
 * Resolve command - print the method and path an action name maps to
 */

import { resolveRoute } from "@route-conventions/core";

export interface ResolveOptions {
  nested?: boolean;
}

export function handleResolve(name: string, options: ResolveOptions): void {
  try {
    const pattern = resolveRoute(name, options.nested ? "nested" : "plain");
    console.log(`${pattern.method} ${pattern.path}`);
  } catch (error) {
    console.error(
      "Error during resolve:",
      error instanceof Error ? error.message : String(error),
    );
    process.exitCode = 1;
  }
}
