// ---------------------------------------------------------------------------
// Werkbank CLI – single invocation, mapped to an exit status
// ---------------------------------------------------------------------------

import { CommanderError } from "commander";
import { getLogger } from "../logging.js";
import { buildProgram, type CliDeps } from "./program.js";

/**
 * Run one command. Usage errors come back as commander's exit code; anything
 * thrown by a command (e.g. a corrupt data file) is logged with its stack and
 * yields 1. "Not found" outcomes are ordinary output and yield 0.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const program = buildProgram(deps);
  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    getLogger().fatal(err);
    return 1;
  }
}
