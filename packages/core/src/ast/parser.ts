/**
 * AST Parser - initializes ts-morph Project and parses action files
 */

import {
  Project,
  SourceFile,
  type CompilerOptions,
  type ProjectOptions,
  ts,
} from 'ts-morph';
import * as fs from 'fs';
import * as path from 'path';

export interface AstParserOptions {
  rootDir: string;
  tsConfigPath?: string;
  compilerOptions?: CompilerOptions;
}

/**
 * AST Parser using ts-morph
 * Manages a Project instance and provides file parsing capabilities
 */
export class AstParser {
  private project: Project;

  constructor(private options: AstParserOptions) {
    this.project = this.initializeProject();
  }

  /**
   * Initialize ts-morph Project
   */
  private initializeProject(): Project {
    const { rootDir, tsConfigPath, compilerOptions } = this.options;

    // Try to find tsconfig.json if not provided
    const resolvedTsConfigPath = tsConfigPath
      ? path.resolve(rootDir, tsConfigPath)
      : this.findTsConfig(rootDir);

    // Only the action files are parsed, never the whole program
    const projectOptions: ProjectOptions = {
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
    };

    if (resolvedTsConfigPath) {
      projectOptions.tsConfigFilePath = resolvedTsConfigPath;
    } else {
      projectOptions.compilerOptions = {
        allowJs: true,
        checkJs: false,
        jsx: ts.JsxEmit.React,
        target: ts.ScriptTarget.ESNext,
      };
    }

    if (compilerOptions) {
      projectOptions.compilerOptions = {
        ...projectOptions.compilerOptions,
        ...compilerOptions,
      };
    }

    return new Project(projectOptions);
  }

  /**
   * Find tsconfig.json in directory hierarchy, stopping at the scanned root
   */
  private findTsConfig(startDir: string): string | undefined {
    const tsConfigPath = path.join(path.resolve(startDir), 'tsconfig.json');
    return fs.existsSync(tsConfigPath) ? tsConfigPath : undefined;
  }

  /**
   * Parse a file, reusing it when it is already part of the project
   */
  parseFile(filePath: string): SourceFile {
    const absolutePath = path.isAbsolute(filePath)
      ? filePath
      : path.resolve(this.options.rootDir, filePath);

    return (
      this.project.getSourceFile(absolutePath) ??
      this.project.addSourceFileAtPath(absolutePath)
    );
  }

  /**
   * Get the underlying ts-morph Project
   */
  getProject(): Project {
    return this.project;
  }
}
