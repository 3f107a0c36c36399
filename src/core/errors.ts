/**
 * Thrown when a schema document cannot be loaded: missing or unreadable file,
 * invalid JSON, or a `$ref` that does not resolve to a known document.
 */
export class SchemaLoadError extends Error {
  /** The schema reference that failed, e.g. `v2/knowledge.json` */
  public readonly ref: string;

  constructor(ref: string, reason: string, options?: { cause?: unknown }) {
    super(reason, options);
    this.name = 'SchemaLoadError';
    this.ref = ref;
  }
}

/**
 * Thrown when a YAML lint configuration is malformed.
 */
export class LintConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LintConfigError';
  }
}

/**
 * Thrown when reading a taxonomy file fails for a reason other than its content.
 */
export class TaxonomyReadingError extends Error {
  public readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to read taxonomy file ${filePath}${reason}`, options);
    this.name = 'TaxonomyReadingError';
    this.filePath = filePath;
  }
}
