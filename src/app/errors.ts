/**
 * Fatal errors that end a run with a specific exit status
 */
export class BackfillError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "BackfillError";
    this.exitCode = exitCode;
  }
}
