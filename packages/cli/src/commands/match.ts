/**
 * Match command - find the action that handles a request
 */

import { RouteScanner } from "@route-conventions/core";
import { loadProjectConfig, type RoutesOptions } from "./routes";

export type MatchOptions = Pick<RoutesOptions, "config" | "actionsDir">;

export async function handleMatch(
  directory: string,
  method: string,
  requestPath: string,
  options: MatchOptions,
): Promise<void> {
  try {
    const config = await loadProjectConfig(directory, options);
    if (!config) return;

    const { table, errors } = await new RouteScanner(config).scan();
    if (errors.length > 0) {
      console.warn(`Ignoring ${errors.length} unroutable action file(s)`);
    }

    const match = table.match(method, requestPath);
    if (!match) {
      console.error(`No route matches ${method.toUpperCase()} ${requestPath}`);
      process.exitCode = 1;
      return;
    }

    console.log(
      `${match.route.name}  ${match.route.method} ${match.route.path}`,
    );
    for (const [param, value] of Object.entries(match.params)) {
      console.log(`  ${param} = ${value}`);
    }
  } catch (error) {
    console.error(
      "Error during match:",
      error instanceof Error ? error.message : String(error),
    );
    process.exitCode = 1;
  }
}
