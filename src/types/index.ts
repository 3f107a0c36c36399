/**
 * Schema kinds shipped in every schema version directory.
 *
 * The kinds other than `Version` double as the default taxonomy folder names.
 */
export enum SchemaName {
  CompositionalSkills = 'compositional_skills',
  Knowledge = 'knowledge',
  Version = 'version',
}

/**
 * Output formats for taxonomy parsing messages
 *
 * Auto     - Github when both GITHUB_ACTIONS and GITHUB_WORKFLOW are set, Standard otherwise
 * Standard - Plain line starting with ERROR or WARN, on standard output
 * Github   - GitHub Actions workflow commands (::error / ::warning)
 * Logging  - Routed through the configured Logger's error/warn
 */
export enum MessageFormat {
  Auto = 'auto',
  Standard = 'standard',
  Github = 'github',
  Logging = 'logging',
}

/**
 * Where a violation came from
 */
export enum ViolationKind {
  /** The schema document itself is not a valid draft 2020-12 schema */
  MetaSchema = 'meta-schema',
  /** A candidate document does not satisfy a valid schema */
  Instance = 'instance',
}

/**
 * Severity of a reported taxonomy message or lint problem
 */
export enum Severity {
  Error = 'error',
  Warning = 'warning',
}

/**
 * Any JSON object; schema documents and candidate documents are both this at rest.
 */
export type JsonObject = { [key: string]: unknown };

/**
 * A schema document loaded from the schema repository
 */
export interface SchemaDocument {
  /** file:// URI of the document; sibling `$ref`s resolve against it */
  uri: string;
  /** Reference relative to the schema base, e.g. `v2/knowledge.json` */
  ref: string;
  version: number;
  name: string;
  contents: JsonObject;
}

/**
 * A schema version directory (`v1`, `v2`, ...)
 */
export interface SchemaVersion {
  name: string;
  version: number;
  path: string;
}

/**
 * A single violated constraint
 */
export interface Violation {
  kind: ViolationKind;
  /** The JSON Schema keyword that failed (`required`, `minItems`, ...) */
  keyword: string;
  /** JSON pointer of the offending location; `''` is the document root */
  pointer: string;
  /** YAML path of the offending location, e.g. `.seed_examples[2].answer`; `.` is the root */
  path: string;
  message: string;
  /** Location of the failing keyword inside the schema */
  schemaPath: string;
  params: Record<string, unknown>;
}

export interface ValidationResult {
  valid: boolean;
  violations: Violation[];
}

export type LintLevel = Severity | 'disable';

export interface LineLengthRule {
  level: LintLevel;
  max: number;
  allowNonBreakableWords: boolean;
}

export interface LevelRule {
  level: LintLevel;
}

export interface EmptyLinesRule {
  level: LintLevel;
  /** Blank lines allowed in a row */
  max: number;
  /** Blank lines allowed at the start of the file */
  maxStart: number;
  /** Blank lines allowed at the end of the file */
  maxEnd: number;
}

export type NewLineType = 'unix' | 'dos' | 'platform';

export interface NewLinesRule {
  level: LintLevel;
  type: NewLineType;
}

/**
 * In-process YAML lint configuration, read from yamllint-style YAML
 */
export interface LintConfig {
  'line-length': LineLengthRule;
  'trailing-spaces': LevelRule;
  'new-line-at-end-of-file': LevelRule;
  'key-duplicates': LevelRule;
  'empty-lines': EmptyLinesRule;
  'new-lines': NewLinesRule;
}

export type LintRuleName = keyof LintConfig;

/**
 * A problem found by the YAML linter
 */
export interface LintProblem {
  line: number;
  col: number;
  level: Severity;
  rule: LintRuleName | 'syntax';
  message: string;
}

/**
 * Where in the taxonomy file a message applies
 */
export interface MessageLocation {
  line?: number;
  col?: number;
  yamlPath?: string;
}

/**
 * A message reported on a taxonomy file
 */
export interface TaxonomyMessage {
  severity: Severity;
  message: string;
  line: number;
  col: number;
  yamlPath: string;
}

/**
 * Taxonomy checker configuration
 */
export interface TaxonomyConfig {
  /** Folder names that start a taxonomy path; they are also schema names */
  taxonomyFolders: string[];
  /**
   * Schema version to validate with. Undefined uses the latest version,
   * a value below 1 uses each document's own `version` key.
   */
  schemaVersion?: number;
  /** yamllint-style configuration text */
  lintConfig: string;
  /** Report every lint problem as an error */
  lintStrict: boolean;
  messageFormat: MessageFormat;
}
