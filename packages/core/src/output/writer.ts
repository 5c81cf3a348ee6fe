/**
 * Manifest writer - output discovered routes to JSON
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import type { RouteDefinition, ScanResult } from "@route-conventions/types";
import { summarizeRoutes } from "./normalize";

export interface WriteOptions {
  outputPath: string;
  pretty?: boolean;
}

const RouteDefinitionSchema = z.object({
  name: z.string(),
  method: z.enum(["GET", "POST", "PUT", "DELETE"]),
  path: z.string(),
  params: z.array(z.string()),
  mode: z.enum(["plain", "nested"]),
  explicit: z.boolean(),
  file: z.string().optional(),
  className: z.string().optional(),
});

const ScanErrorSchema = z.object({
  file: z.string(),
  message: z.string(),
  code: z.string().optional(),
});

export const RouteManifestSchema = z.object({
  summary: z.object({
    totalRoutes: z.number(),
    byMethod: z.record(z.number()),
    nested: z.number(),
    explicit: z.number(),
    filesScanned: z.number(),
    errors: z.number(),
  }),
  routes: z.array(RouteDefinitionSchema),
  errors: z.array(ScanErrorSchema).optional(),
});

export type RouteManifest = z.infer<typeof RouteManifestSchema>;

/**
 * Build the manifest object for a scan result. File paths are stored
 * relative to rootDir when one is given.
 */
export function createManifest(
  scanResult: ScanResult,
  rootDir?: string,
): RouteManifest {
  const relativize = (file: string): string =>
    rootDir ? path.relative(rootDir, file).replace(/\\/g, "/") : file;

  const routes: RouteDefinition[] = scanResult.routes.map((route) =>
    route.file ? { ...route, file: relativize(route.file) } : route,
  );

  const manifest: RouteManifest = {
    summary: {
      ...summarizeRoutes(routes),
      filesScanned: scanResult.filesScanned,
      errors: scanResult.errors.length,
    },
    routes,
  };

  // Include errors if any
  if (scanResult.errors.length > 0) {
    manifest.errors = scanResult.errors.map((error) => ({
      ...error,
      file: relativize(error.file),
    }));
  }

  return manifest;
}

/**
 * Write the route manifest to a JSON file
 */
export async function writeManifest(
  scanResult: ScanResult,
  options: WriteOptions & { rootDir?: string },
): Promise<void> {
  const manifest = createManifest(scanResult, options.rootDir);

  const json =
    options.pretty !== false
      ? JSON.stringify(manifest, null, 2)
      : JSON.stringify(manifest);

  const outputPath = path.resolve(options.outputPath);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, json, "utf-8");
}

/**
 * Read and validate a manifest written by writeManifest
 */
export async function readManifest(manifestPath: string): Promise<RouteManifest> {
  const content = await fs.readFile(manifestPath, "utf-8");
  const parsed = RouteManifestSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const messages = parsed.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid route manifest ${manifestPath}:\n${messages}`);
  }
  return parsed.data;
}
