import * as fs from 'fs';
import * as yaml from 'yaml';
import { mergeConfig, validateConfig } from '../config';
import { SchemaLoadError, TaxonomyReadingError } from '../core/errors';
import { Logger } from '../core/logger';
import { SchemaRepository, isJsonObject } from '../core/schema-repository';
import { TaxonomyParser } from '../core/taxonomy-parser';
import { parseMessageFormat } from '../core/taxonomy';
import { formatViolation } from '../core/violations';
import { SchemaDocument, SchemaName, TaxonomyConfig } from '../types';

/**
 * Everything a command needs from its surroundings
 */
export interface CommandContext {
  logger: Logger;
  config: TaxonomyConfig;
  repository: SchemaRepository;
}

export interface CheckOptions {
  schemaVersion?: string;
  format?: string;
  lintConfig?: string;
  lintStrict?: boolean;
  folders?: string;
}

export interface ValidateOptions {
  schemaVersion?: string;
  kind?: string;
}

function parseVersion(value: string): number | undefined {
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : undefined;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * check: parse and validate taxonomy qna.yaml files.
 * Returns 1 when any file has errors, 2 on bad options.
 */
export function runCheck(files: string[], options: CheckOptions, ctx: CommandContext): number {
  const override: Partial<TaxonomyConfig> = {};

  if (options.schemaVersion !== undefined) {
    const version = parseVersion(options.schemaVersion);
    if (version === undefined) {
      ctx.logger.error(`Invalid schema version: ${options.schemaVersion}`);
      return 2;
    }
    override.schemaVersion = version;
  }
  if (options.format !== undefined) {
    try {
      override.messageFormat = parseMessageFormat(options.format);
    } catch (error) {
      ctx.logger.error(error instanceof Error ? error.message : String(error));
      return 2;
    }
  }
  if (options.lintConfig !== undefined) override.lintConfig = options.lintConfig;
  if (options.lintStrict !== undefined) override.lintStrict = options.lintStrict;
  if (options.folders !== undefined) {
    override.taxonomyFolders = options.folders
      .split(',')
      .map((f) => f.trim())
      .filter((f) => f.length > 0);
  }

  const config = mergeConfig(ctx.config, override);
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    configErrors.forEach((e) => ctx.logger.error(e));
    return 2;
  }

  const parser = TaxonomyParser.fromConfig(config, ctx.logger, ctx.repository);
  let errors = 0;
  let warnings = 0;

  for (const file of files) {
    try {
      const taxonomy = parser.parse(file);
      errors += taxonomy.errors;
      warnings += taxonomy.warnings;
    } catch (error) {
      if (!(error instanceof TaxonomyReadingError)) throw error;
      ctx.logger.error(error.message);
      errors++;
    }
  }

  ctx.logger.log(
    `Checked ${plural(files.length, 'file')}: ${plural(errors, 'error')}, ${plural(warnings, 'warning')}`
  );
  return errors > 0 ? 1 : 0;
}

/**
 * meta-validate: check schema files against the draft 2020-12 meta-schema.
 * Without files, every packaged schema is checked.
 */
export function runMetaValidate(files: string[], ctx: CommandContext): number {
  const { repository, logger } = ctx;
  let failed = 0;

  const documents: Array<() => SchemaDocument> =
    files.length > 0
      ? files.map((f) => () => repository.loadSchemaFile(f))
      : repository
          .schemaVersions()
          .flatMap((v) =>
            repository.schemaNames(v.version).map((name) => () => repository.loadSchema(v.version, name))
          );

  for (const load of documents) {
    let document: SchemaDocument;
    try {
      document = load();
    } catch (error) {
      if (!(error instanceof SchemaLoadError)) throw error;
      logger.error(`${error.ref}: ${error.message}`);
      failed++;
      continue;
    }

    const { valid, violations } = repository.validateSchemaItself(document);
    if (valid) {
      logger.log(`ok: ${document.ref}`);
      continue;
    }
    failed++;
    for (const violation of violations) {
      logger.error(`${document.ref}: ${violation.pointer || '/'} ${violation.message}`);
    }
  }

  if (failed > 0) {
    logger.error(`Schema validation errors were encountered in ${plural(failed, 'schema')}.`);
    return 1;
  }
  logger.log(`ok -- validated ${plural(documents.length, 'schema')}`);
  return 0;
}

/**
 * validate: check a JSON or YAML document against a packaged schema
 */
export function runValidate(file: string, options: ValidateOptions, ctx: CommandContext): number {
  const { repository, logger } = ctx;

  let version: number | undefined = ctx.config.schemaVersion;
  if (options.schemaVersion !== undefined) {
    version = parseVersion(options.schemaVersion);
    if (version === undefined) {
      logger.error(`Invalid schema version: ${options.schemaVersion}`);
      return 2;
    }
  }

  let data: unknown;
  try {
    data = yaml.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    logger.error(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return 2;
  }

  const kind =
    options.kind ??
    (isJsonObject(data) && 'document' in data ? SchemaName.Knowledge : SchemaName.CompositionalSkills);

  try {
    const schema = repository.loadSchema(version ?? repository.latestVersion(), kind);
    const { valid, violations } = repository.validateInstance(schema, data);
    violations.forEach((v) => logger.error(`${file}: ${formatViolation(v)}`));
    if (valid) {
      logger.log(`${file}: valid against ${schema.ref}`);
      return 0;
    }
    logger.log(`${file}: ${plural(violations.length, 'violation')} against ${schema.ref}`);
    return 1;
  } catch (error) {
    if (!(error instanceof SchemaLoadError)) throw error;
    logger.error(`Cannot load schema file ${error.ref}. ${error.message}`);
    return 2;
  }
}

/**
 * versions: list schema versions and their documents
 */
export function runVersions(ctx: CommandContext): number {
  const versions = ctx.repository.schemaVersions();
  if (versions.length === 0) {
    ctx.logger.error(`No schema versions found in ${ctx.repository.schemaBase()}`);
    return 1;
  }
  for (const v of versions) {
    ctx.logger.log(`${v.name}: ${ctx.repository.schemaNames(v.version).join(', ')}`);
  }
  return 0;
}
