export {
  SchemaRepository,
  getDefaultRepository,
  schemaBase,
  schemaVersions,
  validateInstance,
  validateSchemaItself,
} from './schema-repository';
export { Taxonomy, parseMessageFormat, resolveMessageFormat } from './taxonomy';
export { TaxonomyParser, DEFAULT_TAXONOMY_FOLDERS } from './taxonomy-parser';
export type { TaxonomyParserOptions } from './taxonomy-parser';
export { DEFAULT_LINT_CONFIG, lintYaml, parseLintConfig } from './yaml-lint';
export { formatViolation, toYamlPath } from './violations';
export { SchemaLoadError, LintConfigError, TaxonomyReadingError } from './errors';
export { ConsoleLogger, MemoryLogger, defaultLogger } from './logger';
export type { Logger } from './logger';
