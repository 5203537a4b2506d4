export class StructuralParseError extends Error {
  constructor(message: string, public readonly line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = 'StructuralParseError';
  }
}

export class MarkerSequencingError extends Error {
  constructor(
    message: string,
    public readonly marker: string,
    public readonly state: string
  ) {
    super(`${message}: marker ${marker} in state ${state}`);
    this.name = 'MarkerSequencingError';
  }
}

export class NotebookFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotebookFormatError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}
