/**
 * Command definitions
 */

import { Command } from "commander";
import { type DiffOptions, handleDiff } from "./commands/diff";
import { handleMatch, type MatchOptions } from "./commands/match";
import { handlePath, type PathOptions } from "./commands/path";
import { handleResolve, type ResolveOptions } from "./commands/resolve";
import { handleRoutes, type RoutesOptions } from "./commands/routes";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("route-conventions")
    .description("Resolve action names to routes and list the routes of a project")
    .version("0.1.0");

  // Routes command
  program
    .command("routes")
    .description("Discover action files and print their routes")
    .argument("<directory>", "Project directory")
    .option("--root <path>", "Root directory (defaults to <directory>)")
    .option("-c, --config <path>", "Path to config file")
    .option(
      "--actions-dir <path>",
      "Directory holding action files, relative to root (e.g. src/actions). Overrides config."
    )
    .option("-o, --output <path>", "Write the route manifest JSON to this file")
    .action(async (directory: string, options: RoutesOptions) => {
      await handleRoutes(directory, options);
    });

  // Resolve command
  program
    .command("resolve")
    .description("Print the method and path template for an action name")
    .argument("<name>", "Action name, e.g. Api::V1::Users::Show")
    .option("--nested", "Resolve as a resource nested under its parent segment")
    .action((name: string, options: ResolveOptions) => {
      handleResolve(name, options);
    });

  // Path command
  program
    .command("path")
    .description("Print the path for an action name with its parameters filled in")
    .argument("<name>", "Action name, e.g. Projects::Users::Show")
    .argument("[values...]", "Path parameter values, in order")
    .option("--nested", "Resolve as a resource nested under its parent segment")
    .option("-q, --query <pair>", "Query parameter as key=value (repeatable)", collect, [])
    .option("--base-url <url>", "Print an absolute URL under this base")
    .action((name: string, values: string[], options: PathOptions) => {
      handlePath(name, values, options);
    });

  // Match command
  program
    .command("match")
    .description("Find the action that handles a request")
    .argument("<directory>", "Project directory")
    .argument("<method>", "HTTP method")
    .argument("<path>", "Request path")
    .option("-c, --config <path>", "Path to config file")
    .option("--actions-dir <path>", "Directory holding action files, relative to root")
    .action(
      async (directory: string, method: string, requestPath: string, options: MatchOptions) => {
        await handleMatch(directory, method, requestPath, options);
      }
    );

  // Diff command
  program
    .command("diff")
    .description("Compare two route manifests")
    .argument("<baseline>", "Path to baseline manifest JSON file")
    .argument("<current>", "Path to current manifest JSON file")
    .option("-o, --output <path>", "Output file path")
    .action(async (baseline: string, current: string, options: DiffOptions) => {
      await handleDiff(baseline, current, options);
    });

  return program;
}
