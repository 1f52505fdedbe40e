export class CliError extends Error {
  code: string;
  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = 'CliError';
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
