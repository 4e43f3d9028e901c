export abstract class BaseError extends Error {
  public data?: unknown;

  constructor(
    public code: string,
    public status: number,
    message?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}
