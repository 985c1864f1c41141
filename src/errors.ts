/**
 * Thrown when markup contains a `[` that is never closed by a `]`.
 */
export class MalformedMarkupError extends Error {
  readonly input: string;
  readonly offset: number;

  constructor(input: string, offset: number) {
    super(`Unterminated tag directive at offset ${offset}`);
    this.name = "MalformedMarkupError";
    this.input = input;
    this.offset = offset;
  }
}

export function isMalformedMarkupError(
  error: unknown,
): error is MalformedMarkupError {
  return error instanceof MalformedMarkupError;
}
