/**
 * Error types raised while resolving, building and registering routes
 */

export type RouteConventionErrorCode =
  | "UnrecognizedActionKind"
  | "InvalidRouteName"
  | "MissingRouteParam"
  | "UnexpectedRouteParam"
  | "DuplicateRoute"
  | "InvalidRedirectStatus";

/**
 * Base class for all route convention errors
 */
export abstract class RouteConventionError extends Error {
  public readonly code: RouteConventionErrorCode;

  constructor(message: string, code: RouteConventionErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * The terminal segment of a route name is not one of
 * Index, Show, New, Create, Edit, Update, Delete.
 */
export class UnrecognizedActionKindError extends RouteConventionError {
  constructor(
    public readonly actionKind: string,
    public readonly routeName: string,
  ) {
    super(
      `Unrecognized action kind "${actionKind}" in route name "${routeName}". ` +
        `Expected one of Index, Show, New, Create, Edit, Update, Delete.`,
      "UnrecognizedActionKind",
    );
  }
}

export class InvalidRouteNameError extends RouteConventionError {
  constructor(
    public readonly routeName: string,
    reason: string,
  ) {
    super(`Invalid route name "${routeName}": ${reason}`, "InvalidRouteName");
  }
}

export class MissingRouteParamError extends RouteConventionError {
  constructor(
    public readonly param: string,
    public readonly template: string,
  ) {
    super(
      `Missing value for path parameter "${param}" in ${template}`,
      "MissingRouteParam",
    );
  }
}

export class UnexpectedRouteParamError extends RouteConventionError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
    public readonly template: string,
  ) {
    super(
      `${template} takes ${expected} path parameter(s), received ${received}`,
      "UnexpectedRouteParam",
    );
  }
}

export class DuplicateRouteError extends RouteConventionError {
  constructor(
    public readonly routeName: string,
    public readonly existing: string,
    detail: string,
  ) {
    super(
      `Route ${routeName} conflicts with ${existing}: ${detail}`,
      "DuplicateRoute",
    );
  }
}

export class InvalidRedirectStatusError extends RouteConventionError {
  constructor(public readonly status: number) {
    super(
      `Invalid redirect status ${status}. Expected 301, 302, 303, 307 or 308.`,
      "InvalidRedirectStatus",
    );
  }
}
