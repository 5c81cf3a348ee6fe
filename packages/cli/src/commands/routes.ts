/**
 * Routes command - discover action files and print the route table
 */

import { config as loadEnv } from "dotenv";
import {
  RouteScanner,
  formatRouteTable,
  loadConfig,
  writeManifest,
  type ScanConfig,
} from "@route-conventions/core";
import * as fs from "fs/promises";
import * as path from "path";

export interface RoutesOptions {
  root?: string;
  config?: string;
  /** Directory holding action files, relative to root. Overrides config. */
  actionsDir?: string;
  output?: string;
}

/**
 * Resolve the project root and load its configuration, applying CLI overrides.
 * Returns null (with exitCode set) when the directory does not exist.
 */
export async function loadProjectConfig(
  directory: string,
  options: Pick<RoutesOptions, "root" | "config" | "actionsDir">,
): Promise<ScanConfig | null> {
  const rootDir = options.root
    ? path.resolve(process.cwd(), options.root)
    : path.resolve(process.cwd(), directory);

  try {
    const stats = await fs.stat(rootDir);
    if (!stats.isDirectory()) {
      console.error(`Error: ${rootDir} is not a directory`);
      process.exitCode = 1;
      return null;
    }
  } catch {
    console.error(`Error: Directory not found: ${rootDir}`);
    process.exitCode = 1;
    return null;
  }

  loadEnv({ path: path.join(rootDir, ".env") });

  const config = await loadConfig({
    rootDir,
    configPath: options.config,
  });

  if (options.actionsDir !== undefined && options.actionsDir.trim()) {
    config.actionsDir = options.actionsDir.trim();
  }

  console.log(`Using config from: ${options.config || "defaults"}`);
  return config;
}

export async function handleRoutes(
  directory: string,
  options: RoutesOptions,
): Promise<void> {
  try {
    const config = await loadProjectConfig(directory, options);
    if (!config) return;

    console.log(`Scanning ${path.join(config.rootDir, config.actionsDir)}...`);
    const scanner = new RouteScanner(config);
    const result = await scanner.scan();

    console.log(formatRouteTable(result));

    if (options.output) {
      const outputPath = path.resolve(process.cwd(), options.output);
      await writeManifest(result, {
        outputPath,
        pretty: true,
        rootDir: config.rootDir,
      });
      console.log(`✓ Manifest saved to ${outputPath}`);
    }

    // Unroutable actions must not go unnoticed
    if (result.errors.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(
      "Error during routes:",
      error instanceof Error ? error.message : String(error),
    );
    process.exitCode = 1;
  }
}
