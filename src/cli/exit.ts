// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Maps a finished program run to a process exit code. Coded failures were
 * already reported by the command; only the rest is printed here.
 */

import { Cause, Exit, Match, Option, pipe } from "effect";
import { ErrorCode, toExitCode } from "../lib/errors";

const hasCode = (v: unknown): v is { code: number } =>
  typeof v === "object" && v !== null && "code" in v && typeof v.code === "number";

export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => ErrorCode.SUCCESS,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => ErrorCode.GENERAL_ERROR,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(hasCode, (v) => toExitCode(v.code)),
            Match.orElse(() => ErrorCode.GENERAL_ERROR)
          ),
      }),
  });

export const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (err: unknown): void =>
          pipe(
            Match.value(err),
            Match.when(hasCode, () => undefined),
            Match.when(
              (v: unknown): v is { message: string } =>
                typeof v === "object" &&
                v !== null &&
                "message" in v &&
                typeof v.message === "string",
              (v) => console.error(`Error: ${v.message}`)
            ),
            Match.orElse(() => undefined)
          ),
      }),
  });
