export class MissingRequiredColumnError extends Error {
  readonly provider: string;
  readonly columns: string[];
  readonly rowIndex?: number;

  constructor(provider: string, columns: string[], rowIndex?: number) {
    const where = rowIndex === undefined ? '' : ` (row ${rowIndex})`;
    super(`[${provider}] Missing required column${columns.length === 1 ? '' : 's'}: ${columns.join(', ')}${where}`);
    this.name = 'MissingRequiredColumnError';
    this.provider = provider;
    this.columns = columns;
    this.rowIndex = rowIndex;
  }

  /** Same error attributed to a 1-based data row. */
  atRow(rowIndex: number): MissingRequiredColumnError {
    return new MissingRequiredColumnError(this.provider, this.columns, rowIndex);
  }
}

export class UnknownProviderError extends Error {
  constructor(providerId: string, known: string[] = []) {
    const hint = known.length ? `. Available providers: ${known.join(', ')}` : '';
    super(`Unknown provider: ${providerId}${hint}`);
    this.name = 'UnknownProviderError';
  }
}

export class DuplicateProviderIdError extends Error {
  constructor(providerId: string) {
    super(`Provider already registered: ${providerId}`);
    this.name = 'DuplicateProviderIdError';
  }
}

export class ProviderError extends Error {
  constructor(provider: string, message: string) {
    super(`[${provider}] ${message}`);
    this.name = 'ProviderError';
  }
}

export class DecisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecisionError';
  }
}

export class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
