// ---------------------------------------------------------------------------
// Logging – tslog root logger and per-module child loggers
// ---------------------------------------------------------------------------
// Everything goes to stderr; stdout is reserved for command output.
// ---------------------------------------------------------------------------

import { Logger, type ILogObj } from "tslog";

// tslog levels: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
export const LOG_LEVEL_INFO = 3;
export const LOG_LEVEL_WARN = 4;

export type LoggingOptions = {
  verbose?: boolean;
  write?: (chunk: string) => void;
};

function createRootLogger(opts: LoggingOptions = {}): Logger<ILogObj> {
  const write = opts.write ?? ((chunk: string) => process.stderr.write(chunk));
  return new Logger<ILogObj>({
    name: "werkbank",
    type: "pretty",
    minLevel: opts.verbose ? LOG_LEVEL_INFO : LOG_LEVEL_WARN,
    stylePrettyLogs: opts.write === undefined && process.stderr.isTTY === true,
    overwrite: {
      transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
        const message = logArgs.map((arg) => String(arg)).join(" ");
        const errors = logErrors.length > 0 ? "\n" + logErrors.join("\n") : "";
        write(`${logMetaMarkup}${message}${errors}\n`);
      },
    },
  });
}

let rootLogger = createRootLogger();

/** Rebuild the root logger; child loggers created afterwards pick up the new settings. */
export function configureLogging(opts: LoggingOptions): void {
  rootLogger = createRootLogger(opts);
}

export function getLogger(): Logger<ILogObj> {
  return rootLogger;
}

export function getChildLogger(bindings: { module: string }): Logger<ILogObj> {
  return rootLogger.getSubLogger({ name: bindings.module });
}
