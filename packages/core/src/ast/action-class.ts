/**
 * Reads an action's route declaration from its exported class.
 *
 * ```ts
 * export class Show {
 *   static nested = true;
 * }
 *
 * export class Search {
 *   static path = "/users/search";
 *   static method = "GET";
 * }
 * ```
 */

import {
  ClassDeclaration,
  Node,
  SourceFile,
  SyntaxKind,
} from 'ts-morph';
import type { HttpMethod } from '@route-conventions/types';
import { isHttpMethod } from '../conventions';

export interface ActionDeclaration {
  className?: string;
  nested: boolean;
  path?: string;
  method?: HttpMethod;
  /** Static properties that were present but could not be read */
  problems: string[];
}

/**
 * First exported class of the file, default export included
 */
export function findActionClass(
  sourceFile: SourceFile,
): ClassDeclaration | undefined {
  return sourceFile
    .getClasses()
    .find((declaration) => declaration.isExported() || declaration.isDefaultExport());
}

export function readActionDeclaration(sourceFile: SourceFile): ActionDeclaration {
  const declaration: ActionDeclaration = { nested: false, problems: [] };
  const actionClass = findActionClass(sourceFile);
  if (!actionClass) {
    return declaration;
  }

  declaration.className = actionClass.getName();

  const nested = readStatic(actionClass, 'nested');
  if (nested !== undefined) {
    if (typeof nested === 'boolean') {
      declaration.nested = nested;
    } else {
      declaration.problems.push('static nested must be true or false');
    }
  }

  const declaredPath = readStatic(actionClass, 'path');
  if (declaredPath !== undefined) {
    if (typeof declaredPath === 'string') {
      declaration.path = declaredPath;
    } else {
      declaration.problems.push('static path must be a string literal');
    }
  }

  const method = readStatic(actionClass, 'method');
  if (method !== undefined) {
    const upper = typeof method === 'string' ? method.toUpperCase() : '';
    if (isHttpMethod(upper)) {
      declaration.method = upper;
    } else {
      declaration.problems.push(
        'static method must be one of "GET", "POST", "PUT", "DELETE"',
      );
    }
  }

  return declaration;
}

type StaticValue = string | boolean | null;

/**
 * Literal value of a static property initializer.
 * `undefined` when the property is absent, `null` when it is not a literal.
 */
function readStatic(
  actionClass: ClassDeclaration,
  name: string,
): StaticValue | undefined {
  const property = actionClass.getStaticProperty(name);
  if (!property || !Node.isPropertyDeclaration(property)) {
    return undefined;
  }

  let initializer = property.getInitializer();
  // `static method = "GET" as const`
  while (initializer && Node.isAsExpression(initializer)) {
    initializer = initializer.getExpression();
  }
  if (!initializer) return null;

  if (Node.isStringLiteral(initializer) || Node.isNoSubstitutionTemplateLiteral(initializer)) {
    return initializer.getLiteralValue();
  }
  switch (initializer.getKind()) {
    case SyntaxKind.TrueKeyword:
      return true;
    case SyntaxKind.FalseKeyword:
      return false;
    default:
      return null;
  }
}
