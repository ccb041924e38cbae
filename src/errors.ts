/** Raised when a point set (or a point file) cannot be turned into a hull input. */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    /** Index of the offending point, when a single point is at fault. */
    public readonly index?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'InvalidInputError';
  }
}
