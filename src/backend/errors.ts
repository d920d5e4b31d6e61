/**
 * Raised for any input the calculator cannot evaluate: missing radar
 * parameters, a malformed noise cascade, or CLI options that leave a
 * mutually exclusive group unresolved.
 */
export class InvalidInputError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = [message]) {
    super(message)
    this.name = 'InvalidInputError'
    this.issues = issues
  }
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError
}
