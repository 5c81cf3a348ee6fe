/**
 * Core scanner - action files to a route table
 */

import type { ScanConfig, ScanResult, ScanError } from "@route-conventions/types";
import { scanActionFiles } from "./scanner/file-scanner";
import { AstParser } from "./ast/parser";
import { definitionFromActionFile } from "./discovery";
import { RouteConventionError } from "./errors";
import { RouteTable } from "./router";

export class RouteScanner {
  private astParser: AstParser;

  constructor(private config: ScanConfig) {
    this.astParser = new AstParser({
      rootDir: config.rootDir,
    });
  }

  /**
   * Discover every action under the actions directory and register its route.
   * Files that cannot yield a route are reported in `errors` and left out.
   */
  async scan(): Promise<ScanResult & { table: RouteTable }> {
    // Step 1: Find action files
    const fileScanResult = await scanActionFiles(this.config);
    if (fileScanResult.count === 0) {
      console.warn(`No action files found in ${fileScanResult.actionsDir}`);
    } else {
      console.log(`Found ${fileScanResult.count} action file(s) in ${this.config.actionsDir}`);
    }

    // Step 2: Parse each file and resolve its route
    const table = new RouteTable();
    const errors: ScanError[] = [];
    let filesParsed = 0;

    for (const filePath of fileScanResult.files) {
      try {
        const sourceFile = this.astParser.parseFile(filePath);
        filesParsed++;
        table.add(definitionFromActionFile(sourceFile, fileScanResult.actionsDir));
      } catch (error) {
        errors.push({
          file: filePath,
          message: error instanceof Error ? error.message : String(error),
          code: error instanceof RouteConventionError ? error.code : undefined,
        });
      }
    }

    console.log(`Resolved ${table.size} route(s) from ${filesParsed} file(s)`);
    if (errors.length > 0) {
      console.warn(`${errors.length} action file(s) could not be routed`);
    }

    return {
      routes: table.list(),
      filesScanned: filesParsed,
      errors,
      table,
    };
  }

  /**
   * Get the AST parser instance (for advanced usage)
   */
  getAstParser(): AstParser {
    return this.astParser;
  }
}

export * from "@route-conventions/types";
export * from "./errors";
export * from "./conventions";
export * from "./helpers";
export * from "./router";
export * from "./discovery";
export * from "./config";
export * from "./output";
export { scanActionFiles, type FileScanResult } from "./scanner/file-scanner";
export { AstParser, type AstParserOptions } from "./ast/parser";
export {
  findActionClass,
  readActionDeclaration,
  type ActionDeclaration,
} from "./ast/action-class";
