#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * jailconf - jail.conf parser and syntax checker
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { Effect } from "effect";
import { exitCodeFromExit, logExitError } from "./cli/exit";
import { program } from "./cli/index";

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

// Only run if this is the main entry point
if (require.main === module) {
  void main();
}
