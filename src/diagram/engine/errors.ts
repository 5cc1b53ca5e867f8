/**
 * Programming errors raised by the public engine surface.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly argumentName: string,
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
