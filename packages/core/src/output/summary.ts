/**
 * Terminal route table formatter
 */

import * as path from 'path';
import type { ScanResult } from '@route-conventions/types';
import { summarizeRoutes } from './normalize';

/**
 * Format discovered routes as an aligned table: method, path, action name
 */
export function formatRouteTable(scanResult: ScanResult): string {
  const stats = summarizeRoutes(scanResult.routes);
  const lines: string[] = [];

  lines.push('');
  lines.push('═'.repeat(60));
  lines.push('  Routes');
  lines.push('═'.repeat(60));
  lines.push('');

  if (scanResult.routes.length > 0) {
    const pathWidth = Math.max(
      ...scanResult.routes.map((route) => route.path.length),
    );
    for (const route of scanResult.routes) {
      const flags = [
        route.mode === 'nested' ? 'nested' : '',
        route.explicit ? 'explicit' : '',
      ].filter(Boolean);
      const suffix = flags.length > 0 ? `  (${flags.join(', ')})` : '';
      lines.push(
        `  ${route.method.padEnd(7)} ${route.path.padEnd(pathWidth)}  ${route.name}${suffix}`,
      );
    }
  } else {
    lines.push('  No routes found');
  }
  lines.push('');

  lines.push('Overview:');
  lines.push(`  Total routes:   ${stats.totalRoutes}`);
  lines.push(`  Nested:         ${stats.nested}`);
  lines.push(`  Explicit:       ${stats.explicit}`);
  lines.push(`  Files scanned:  ${scanResult.filesScanned}`);
  if (scanResult.errors.length > 0) {
    lines.push(`  Errors:         ${scanResult.errors.length}`);
  }
  lines.push('');

  if (scanResult.errors.length > 0) {
    lines.push('Errors:');
    for (const error of scanResult.errors.slice(0, 5)) {
      lines.push(`  ${path.basename(error.file)} - ${error.message}`);
    }
    if (scanResult.errors.length > 5) {
      lines.push(`  ... and ${scanResult.errors.length - 5} more`);
    }
    lines.push('');
  }

  lines.push('═'.repeat(60));
  lines.push('');

  return lines.join('\n');
}
