/**
 * Default configuration values
 */

import type { ScanConfig } from "@route-conventions/types";

export const DEFAULT_ACTIONS_DIR = "src/actions";

export const DEFAULT_CONFIG: Omit<ScanConfig, "rootDir"> = {
  actionsDir: DEFAULT_ACTIONS_DIR,
  include: ["**/*.{ts,tsx,js}"],
  exclude: [
    "**/*.test.{js,ts,tsx}",
    "**/*.spec.{js,ts,tsx}",
    "**/__mocks__/**",
  ],
};

/** Environment variable supplying baseUrl when the config file does not */
export const BASE_URL_ENV = "ROUTE_CONVENTIONS_BASE_URL";
