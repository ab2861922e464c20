export class DatasetMissingError extends Error {
  constructor(public readonly path: string) {
    super(`Traffic dataset not found at ${path}`);
    this.name = 'DatasetMissingError';
  }
}

export class DatasetFormatError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly line?: number
  ) {
    super(line === undefined ? `${path}: ${message}` : `${path}:${line}: ${message}`);
    this.name = 'DatasetFormatError';
  }
}
