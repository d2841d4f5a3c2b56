export abstract class BaseError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message?: string,
    public readonly data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}
