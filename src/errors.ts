/**
 * Error kinds raised by the ranking core and its collaborators.
 *
 * The core only throws; the MCP server and the CLI decide how to show them.
 */

export type PagerankErrorCode = 'PRECONDITION' | 'NON_CONVERGENCE' | 'CORPUS';

export class PagerankError extends Error {
  readonly code: PagerankErrorCode;

  constructor(code: PagerankErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Caller error: the input can never produce a valid distribution. */
export class PreconditionError extends PagerankError {
  constructor(message: string) {
    super('PRECONDITION', message);
  }
}

/** The iterative solver ran out of sweeps before meeting its tolerance. */
export class ConvergenceError extends PagerankError {
  readonly iterations: number;
  readonly delta: number;

  constructor(iterations: number, delta: number, tolerance: number) {
    super(
      'NON_CONVERGENCE',
      `PageRank did not converge after ${iterations} iterations (max delta ${delta} > tolerance ${tolerance})`,
    );
    this.iterations = iterations;
    this.delta = delta;
  }
}

export class CorpusError extends PagerankError {
  readonly directory: string;
  /** Set when a single page, not the directory listing, failed. */
  readonly file?: string;

  constructor(directory: string, cause: unknown, file?: string) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const what = file === undefined ? `directory ${directory}` : `file ${file}`;
    super('CORPUS', `Cannot read corpus ${what}: ${reason}`, { cause });
    this.directory = directory;
    this.file = file;
  }
}

export function assertDamping(damping: number): void {
  if (!(damping > 0 && damping < 1)) {
    throw new PreconditionError(`Damping factor must be in (0, 1), got ${damping}`);
  }
}
