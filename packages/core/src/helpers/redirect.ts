import type {
  Redirect,
  RedirectStatus,
  RouteTarget,
} from "@route-conventions/types";
import { InvalidRedirectStatusError } from "../errors";

const REDIRECT_STATUSES: readonly number[] = [301, 302, 303, 307, 308];

function isRedirectStatus(status: number): status is RedirectStatus {
  return REDIRECT_STATUSES.includes(status);
}

/**
 * Redirect to a path or to a filled route. Defaults to 302 Found.
 */
export function redirectTo(
  target: RouteTarget | string,
  status: number = 302,
): Redirect {
  if (!isRedirectStatus(status)) {
    throw new InvalidRedirectStatusError(status);
  }
  return {
    status,
    location: typeof target === "string" ? target : target.path,
  };
}
