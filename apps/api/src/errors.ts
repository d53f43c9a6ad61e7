export class UnsupportedSourceError extends Error {
  readonly sourceType: string;

  constructor(sourceType: string) {
    super(`Unsupported source type: ${sourceType}`);
    this.name = 'UnsupportedSourceError';
    this.sourceType = sourceType;
  }
}

export const errorMessage = (err: unknown, fallback = 'Unexpected error') =>
  err instanceof Error && err.message ? err.message : fallback;
