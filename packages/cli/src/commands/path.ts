/**
 * Path command - fill an action's path with values
 */

import { config as loadEnv } from "dotenv";
import {
  BASE_URL_ENV,
  buildQueryString,
  defineAction,
  joinUrl,
  type QueryParams,
  type QueryValue,
} from "@route-conventions/core";

export interface PathOptions {
  nested?: boolean;
  /** key=value pairs, repeatable */
  query?: string[];
  baseUrl?: string;
}

/**
 * Parse `key=value` pairs. A key given more than once collects its values.
 */
export function parseQueryPairs(pairs: string[]): QueryParams {
  const query: Record<string, QueryValue[]> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Invalid query pair "${pair}", expected key=value`);
    }
    const key = pair.slice(0, separator);
    const value = pair.slice(separator + 1);
    (query[key] ??= []).push(value);
  }

  const result: QueryParams = {};
  for (const [key, values] of Object.entries(query)) {
    result[key] = values.length === 1 ? values[0] : values;
  }
  return result;
}

export function handlePath(
  name: string,
  values: string[],
  options: PathOptions,
): void {
  try {
    loadEnv();
    const helpers = defineAction(name, {
      mode: options.nested ? "nested" : "plain",
    });
    const query = buildQueryString(parseQueryPairs(options.query ?? []));
    const filled = helpers.path(...values) + query;

    const baseUrl = options.baseUrl ?? process.env[BASE_URL_ENV];
    console.log(baseUrl ? joinUrl(baseUrl, filled) : filled);
  } catch (error) {
    console.error(
      "Error during path:",
      error instanceof Error ? error.message : String(error),
    );
    process.exitCode = 1;
  }
}
