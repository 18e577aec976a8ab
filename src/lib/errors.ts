// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for jailconf.
 * Uses typed error codes that map to exit codes.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;

  // System (20-29)
  readonly FILE_READ_FAILED: 27;
}

/**
 * Error codes for all jailconf operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,

  FILE_READ_FAILED: 27,
};

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: typeof ErrorCode.GENERAL_ERROR | typeof ErrorCode.INVALID_ARGS;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Input could not be located (missing file, unreadable path argument). */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: typeof ErrorCode.CONFIG_NOT_FOUND;
  readonly message: string;
  readonly path?: string;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: typeof ErrorCode.FILE_READ_FAILED;
  readonly message: string;
  readonly cause?: Error;
}> {}

export type AppError = GeneralError | ConfigError | SystemError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: number): number => Math.min(code, 125);

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};
