// ---------------------------------------------------------------------------
// Werkbank Config – resolved once per invocation from global CLI options
// ---------------------------------------------------------------------------

import { resolveWorkshopStorePath } from "../workshop/store.js";

export type WerkbankConfig = {
  /** Absolute path of the JSON data file. */
  storePath: string;
  verbose: boolean;
};

export type GlobalCliOptions = {
  data?: string;
  verbose?: boolean;
};

export function loadConfig(opts: GlobalCliOptions = {}): WerkbankConfig {
  return {
    storePath: resolveWorkshopStorePath(opts.data),
    verbose: opts.verbose ?? false,
  };
}
