/**
 * Diff command - compare two route manifests
 */

import { diffManifests, readManifest, type RouteManifest } from '@route-conventions/core';
import * as fs from 'fs/promises';
import * as path from 'path';

export interface DiffOptions {
  output?: string;
}

export async function handleDiff(
  baselinePath: string,
  currentPath: string,
  options: DiffOptions
): Promise<void> {
  try {
    // Load both manifests
    const baselineFile = path.resolve(process.cwd(), baselinePath);
    const currentFile = path.resolve(process.cwd(), currentPath);

    let baseline: RouteManifest;
    let current: RouteManifest;

    try {
      baseline = await readManifest(baselineFile);
    } catch (error) {
      console.error(`Error: Failed to load baseline from ${baselineFile}: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
      return;
    }

    try {
      current = await readManifest(currentFile);
    } catch (error) {
      console.error(`Error: Failed to load current manifest from ${currentFile}: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
      return;
    }

    console.log('Comparing route manifests...');
    const diff = diffManifests(baseline, current);

    const output = JSON.stringify(diff, null, 2);

    if (options.output) {
      const outputPath = path.resolve(process.cwd(), options.output);
      await fs.writeFile(outputPath, output, 'utf-8');
      console.log(`\n✓ Diff complete! Results saved to ${outputPath}`);
      console.log(`  Added: ${diff.added.length}, Removed: ${diff.removed.length}, Changed: ${diff.changed.length}`);
    } else {
      console.log('\n' + output);
    }
  } catch (error) {
    console.error('Error during diff:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
