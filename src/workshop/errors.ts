// ---------------------------------------------------------------------------
// Workshop Errors
// ---------------------------------------------------------------------------

export class DataCorruptionError extends Error {
  readonly storePath: string;

  constructor(storePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Data file ${storePath} is corrupt: ${detail}`, options);
    this.name = "DataCorruptionError";
    this.storePath = storePath;
  }
}
