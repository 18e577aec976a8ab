// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Log settings shared by the CLI flags, the environment and the logger.
 * Flags win over `JAILCONF_*` variables, which win over these defaults.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface LogSettings {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export const DEFAULT_LOG_SETTINGS: LogSettings = { level: "info", format: "pretty" };

/** Forced by `--verbose` and `JAILCONF_DEBUG`, whatever else is set. */
export const VERBOSE_LEVEL: LogLevel = "debug";
