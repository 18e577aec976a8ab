// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `JAILCONF_*` environment variables as Effect `Config` values; nothing is
 * read until the CLI yields them. Level and format stay `None` when unset so
 * flags and defaults can take over.
 */

import { Config, ConfigProvider, type Option } from "effect";
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from "./logging";

const NAMESPACE = "JAILCONF";

/** JAILCONF_LOG_LEVEL */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVELS)("LOG_LEVEL")),
  NAMESPACE
);

/** JAILCONF_LOG_FORMAT */
export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMATS)("LOG_FORMAT")),
  NAMESPACE
);

/** JAILCONF_DEBUG. When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  NAMESPACE
);

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  logLevel: "JAILCONF_LOG_LEVEL",
  logFormat: "JAILCONF_LOG_FORMAT",
  debug: "JAILCONF_DEBUG",
} as const;

export interface TestConfigOverrides {
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly debug?: string;
}

/**
 * Create a ConfigProvider for testing. Only the overridden variables are
 * present, so the option configs observe the rest as unset.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const result = await Effect.runPromise(
 *   Effect.withConfigProvider(LogLevelOptionConfig, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const entries = new Map<string, string>();
  if (overrides.logLevel !== undefined) {
    entries.set(envVarNames.logLevel, overrides.logLevel);
  }
  if (overrides.logFormat !== undefined) {
    entries.set(envVarNames.logFormat, overrides.logFormat);
  }
  if (overrides.debug !== undefined) {
    entries.set(envVarNames.debug, overrides.debug);
  }
  return ConfigProvider.fromMap(entries, { pathDelim: "_" });
};
