/** Unrecoverable condition inside a tick. Ends the tick loop instead of skipping an instrument. */
export class FatalEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalEngineError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
