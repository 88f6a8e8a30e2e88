export type BootstrapState =
  | 'CHECKING_TOOLING'
  | 'DETECTING'
  | 'BASELINING'
  | 'UPGRADING'
  | 'VERIFYING'
  | 'REPORTING'
  | 'STARTING_SERVICE';

export type BootstrapErrorKind =
  | 'config'
  | 'connectivity'
  | 'unmigrated'
  | 'migration'
  | 'schema'
  | 'launch';

/**
 * Fatal startup failure. `state` is where the run stopped; the entry point turns any of
 * these into a final `(e)` line and exit code 1.
 */
export class BootstrapError extends Error {
  override readonly name = 'BootstrapError';

  constructor(
    readonly kind: BootstrapErrorKind,
    readonly state: BootstrapState,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
