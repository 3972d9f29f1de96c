export class CliError extends Error {
  constructor(message: string, public readonly causeError?: unknown) {
    super(message);
    this.name = "CliError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof CliError) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.name && error.name !== "Error" ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}
