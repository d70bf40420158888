export class PDFBoxError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'PDFBoxError';
  }
}

/** Missing Java runtime, or a PDFBOX override that points nowhere. */
export class ConfigError extends PDFBoxError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class NetworkError extends PDFBoxError {
  constructor(
    message: string,
    public url: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'NetworkError';
  }
}

export class VersionParseError extends PDFBoxError {
  constructor(public version: string) {
    super(`Invalid version: "${version}"`);
    this.name = 'VersionParseError';
  }
}

export class ResolutionError extends PDFBoxError {
  constructor(message: string) {
    super(message);
    this.name = 'ResolutionError';
  }
}

export class IntegrityError extends PDFBoxError {
  constructor(
    public url: string,
    public expected: string,
    public actual: string,
  ) {
    super(`Integrity check failed for ${url}: expected sha512 ${expected}, got ${actual}`);
    this.name = 'IntegrityError';
  }
}

export class ExecutionError extends PDFBoxError {
  constructor(
    message: string,
    public command: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'ExecutionError';
  }
}
