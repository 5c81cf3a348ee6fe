/**
 * File system scanning layer
 * Finds action files under the actions directory using fast-glob
 */

import fg from 'fast-glob';
import * as fs from 'fs';
import * as path from 'path';
import type { ScanConfig } from '@route-conventions/types';

export interface FileScanResult {
  /** Absolute path of the actions directory */
  actionsDir: string;
  files: string[];
  count: number;
}

/**
 * Default ignore patterns that should always be excluded
 */
const DEFAULT_IGNORE_PATTERNS = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
  '**/*.d.ts',
];

/**
 * Scan the actions directory based on configuration
 * Returns absolute file paths ready for AST parsing
 */
export async function scanActionFiles(config: ScanConfig): Promise<FileScanResult> {
  const { rootDir, actionsDir, include, exclude } = config;
  const actionsDirAbs = path.resolve(rootDir, actionsDir);

  if (!fs.existsSync(actionsDirAbs) || !fs.statSync(actionsDirAbs).isDirectory()) {
    return { actionsDir: actionsDirAbs, files: [], count: 0 };
  }

  const includePatterns = include && include.length > 0
    ? include
    : ['**/*.{ts,tsx,js}'];

  const excludePatterns = [
    ...DEFAULT_IGNORE_PATTERNS,
    ...(exclude || []),
  ];

  const files = await fg(includePatterns, {
    cwd: actionsDirAbs,
    ignore: excludePatterns,
    absolute: true,
    onlyFiles: true,
    dot: false,
  });

  // Sort for consistent output
  const sortedFiles = files.sort();

  return {
    actionsDir: actionsDirAbs,
    files: sortedFiles,
    count: sortedFiles.length,
  };
}
