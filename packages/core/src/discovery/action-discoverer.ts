/**
 * Turn action files into route definitions.
 *
 * The file's path under the actions directory is its action name:
 *   src/actions/my_admin_section/users/show.ts -> MyAdminSection::Users::Show
 */

import * as path from "path";
import type { SourceFile } from "ts-morph";
import type { RouteDefinition } from "@route-conventions/types";
import {
  ROUTE_NAME_SEPARATOR,
  camelize,
  formatRouteName,
  isActionKind,
  routeName,
} from "../conventions";
import { UnrecognizedActionKindError } from "../errors";
import { defineAction, paramNames } from "../helpers";
import { readActionDeclaration } from "../ast/action-class";

export interface ActionNameParts {
  segments: string[];
  action: string;
}

/**
 * Given an action file under actionsDir, compute its name parts.
 * e.g. /repo/src/actions/projects/users/index.ts
 *  -> actionsDir = /repo/src/actions
 *  -> { segments: ["Projects", "Users"], action: "Index" }
 */
export function actionFileToNameParts(
  actionFilePath: string,
  actionsDir: string,
): ActionNameParts {
  const relative = path
    .relative(path.resolve(actionsDir), actionFilePath)
    .replace(/\\/g, "/");
  const withoutExtension = relative.replace(/\.[^/.]+$/, "");
  const parts = withoutExtension.split("/").map(camelize);

  return {
    segments: parts.slice(0, -1),
    action: parts[parts.length - 1],
  };
}

/**
 * Build the route definition declared by one parsed action file.
 * Throws a RouteConventionError when the file cannot yield a route.
 */
export function definitionFromActionFile(
  sourceFile: SourceFile,
  actionsDir: string,
): RouteDefinition {
  const filePath = sourceFile.getFilePath();
  const parts = actionFileToNameParts(filePath, actionsDir);
  const declaration = readActionDeclaration(sourceFile);
  const displayName = [...parts.segments, parts.action].join(ROUTE_NAME_SEPARATOR);

  if (declaration.problems.length > 0) {
    throw new Error(`${displayName}: ${declaration.problems.join("; ")}`);
  }

  const mode = declaration.nested ? "nested" : "plain";

  if (isActionKind(parts.action)) {
    const helpers = defineAction(routeName(parts.segments, parts.action), {
      mode,
      path: declaration.path,
      method: declaration.method,
    });
    return {
      name: formatRouteName(helpers.name),
      method: helpers.pattern.method,
      path: helpers.pattern.path,
      params: helpers.pattern.params,
      mode,
      explicit: helpers.explicit,
      file: filePath,
      className: declaration.className,
    };
  }

  // Actions outside the seven kinds are routable only with a declared path and method
  if (declaration.path === undefined || declaration.method === undefined) {
    throw new UnrecognizedActionKindError(parts.action, displayName);
  }
  if (!declaration.path.startsWith("/")) {
    throw new Error(
      `${displayName}: declared path "${declaration.path}" must start with "/"`,
    );
  }

  return {
    name: displayName,
    method: declaration.method,
    path: declaration.path,
    params: paramNames(declaration.path),
    mode,
    explicit: true,
    file: filePath,
    className: declaration.className,
  };
}
