import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { TAXONOMY_FILE_NAME } from '../config/schema-paths';
import {
  JsonObject,
  LintConfig,
  MessageFormat,
  SchemaName,
  Severity,
  TaxonomyConfig,
} from '../types';
import { SchemaLoadError, TaxonomyReadingError } from './errors';
import { Logger, defaultLogger } from './logger';
import { SchemaRepository, getDefaultRepository, isJsonObject } from './schema-repository';
import { Taxonomy, parseMessageFormat } from './taxonomy';
import { pointerToSegments } from './violations';
import { DEFAULT_LINT_CONFIG, ParsedYaml, lintYaml, parseLintConfig, parseYaml } from './yaml-lint';

/**
 * Taxonomy folders, which are also the schema names
 */
export const DEFAULT_TAXONOMY_FOLDERS: string[] = [
  SchemaName.CompositionalSkills,
  SchemaName.Knowledge,
];

/**
 * Violation messages longer than this keep only their tail
 */
const MAX_MESSAGE_LENGTH = 200;

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

export interface TaxonomyParserOptions {
  taxonomyFolders?: string[];
  /**
   * Undefined uses the latest schema version; a value below 1 uses the
   * `version` key of each document.
   */
  schemaVersion?: number;
  /** yamllint-style configuration, DEFAULT_LINT_CONFIG when omitted */
  lintConfig?: string;
  /** Report every lint problem as an error */
  lintStrict?: boolean;
  messageFormat?: MessageFormat | string;
  logger?: Logger;
  repository?: SchemaRepository;
  env?: NodeJS.ProcessEnv;
}

function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined || value === '' || value === 0 || value === false) {
    return true;
  }
  if (Array.isArray(value)) return value.length === 0;
  return isJsonObject(value) && Object.keys(value).length === 0;
}

/**
 * Parser for taxonomy qna.yaml files.
 *
 * Each parse lints the YAML text (schema versions above 1), validates the document
 * against the schema for its folder, and reports every problem on the returned Taxonomy.
 */
export class TaxonomyParser {
  readonly taxonomyFolders: string[];
  readonly schemaVersion: number;
  readonly lintConfig: LintConfig;
  readonly lintStrict: boolean;
  readonly messageFormat: MessageFormat;
  private readonly logger: Logger;
  private readonly repository: SchemaRepository;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: TaxonomyParserOptions = {}) {
    this.repository = options.repository ?? getDefaultRepository();
    this.taxonomyFolders = options.taxonomyFolders ?? [...DEFAULT_TAXONOMY_FOLDERS];
    this.schemaVersion = options.schemaVersion ?? this.repository.latestVersion();
    this.lintConfig = parseLintConfig(options.lintConfig ?? DEFAULT_LINT_CONFIG);
    this.lintStrict = options.lintStrict ?? false;
    this.messageFormat = parseMessageFormat(options.messageFormat ?? MessageFormat.Auto);
    this.logger = options.logger ?? defaultLogger;
    this.env = options.env ?? process.env;
  }

  static fromConfig(
    config: TaxonomyConfig,
    logger: Logger = defaultLogger,
    repository?: SchemaRepository
  ): TaxonomyParser {
    return new TaxonomyParser({
      taxonomyFolders: config.taxonomyFolders,
      schemaVersion: config.schemaVersion,
      lintConfig: config.lintConfig,
      lintStrict: config.lintStrict,
      messageFormat: config.messageFormat,
      logger,
      repository,
    });
  }

  /**
   * Parse a qna.yaml file. Problems with its content are reported on the returned
   * Taxonomy; only unexpected failures throw TaxonomyReadingError.
   */
  parse(filePath: string): Taxonomy {
    const absPath = path.resolve(filePath);
    const taxonomy = new Taxonomy({
      path: this.taxonomyPath(absPath),
      absPath,
      messageFormat: this.messageFormat,
      logger: this.logger,
      env: this.env,
    });

    const stat = fs.statSync(absPath, { throwIfNoEntry: false });
    if (!stat || !stat.isFile()) {
      return taxonomy.error(`The file "${absPath}" does not exist or is not a file`);
    }

    const name = path.basename(absPath);
    if (name !== TAXONOMY_FILE_NAME) {
      return taxonomy.error(
        `Taxonomy file must be named "${TAXONOMY_FILE_NAME}"; "${name}" is not a valid name`
      );
    }

    try {
      const content = fs.readFileSync(absPath, 'utf-8');
      const parsedYaml = parseYaml(content);

      const fatal = parsedYaml.document.errors.filter((e) => e.code !== 'DUPLICATE_KEY');
      if (fatal.length > 0) {
        for (const error of fatal) {
          const { line, col } = parsedYaml.lineCounter.linePos(error.pos[0]);
          taxonomy.error(`syntax error: ${error.message}`, { line, col });
        }
        return taxonomy;
      }

      const data: unknown = parsedYaml.document.toJS();
      if (isEmpty(data)) {
        return taxonomy.warning('The file is empty');
      }
      if (!isJsonObject(data)) {
        return taxonomy.error(
          'The file is not valid. The top-level element is not an object with key-value pairs.'
        );
      }

      taxonomy.version = this.resolveVersion(data);
      taxonomy.parsed = data;

      // Version 1 files predate linting
      if (taxonomy.version > 1) {
        this.lint(content, parsedYaml, taxonomy);
      }

      this.schemaValidate(parsedYaml, taxonomy);
    } catch (error) {
      throw new TaxonomyReadingError(absPath, { cause: error });
    }

    return taxonomy;
  }

  /**
   * The path from the innermost taxonomy folder down, or the absolute path
   */
  private taxonomyPath(absPath: string): string {
    const parts = absPath.split(path.sep);
    for (let i = parts.length - 1; i >= 0; i--) {
      if (this.taxonomyFolders.includes(parts[i])) {
        return parts.slice(i).join('/');
      }
    }
    return absPath;
  }

  private resolveVersion(parsed: JsonObject): number {
    if (this.schemaVersion >= 1) return this.schemaVersion;

    const declared = parsed.version ?? 1;
    if (typeof declared === 'number' && Number.isFinite(declared)) {
      return Math.trunc(declared);
    }
    if (typeof declared === 'string' && INTEGER_STRING.test(declared)) {
      return parseInt(declared, 10);
    }
    // Schema validation reports the wrong type
    return 1;
  }

  private lint(content: string, parsedYaml: ParsedYaml, taxonomy: Taxonomy): void {
    for (const problem of lintYaml(content, this.lintConfig, parsedYaml)) {
      const message = `${problem.message} (${problem.rule})`;
      const location = { line: problem.line, col: problem.col };
      if (this.lintStrict || problem.level === Severity.Error) {
        taxonomy.error(message, location);
      } else {
        taxonomy.warning(message, location);
      }
    }
  }

  private schemaValidate(parsedYaml: ParsedYaml, taxonomy: Taxonomy): void {
    const folder = taxonomy.path.split('/')[0];
    let schemaName = folder;
    if (!this.taxonomyFolders.includes(folder)) {
      schemaName = 'document' in taxonomy.parsed ? SchemaName.Knowledge : SchemaName.CompositionalSkills;
    }

    try {
      const schema = this.repository.loadSchema(taxonomy.version, schemaName);
      const { violations } = this.repository.validateInstance(schema, taxonomy.parsed);
      for (const violation of violations) {
        taxonomy.error(violation.message.slice(-MAX_MESSAGE_LENGTH), {
          line: this.lineOf(parsedYaml, violation.pointer),
          yamlPath: violation.path,
        });
      }
    } catch (error) {
      if (error instanceof SchemaLoadError) {
        taxonomy.error(`Cannot load schema file ${error.ref}. ${error.message}`);
        return;
      }
      throw error;
    }
  }

  /**
   * Line of the node at a JSON pointer, or of its nearest existing ancestor
   */
  private lineOf({ document, lineCounter }: ParsedYaml, pointer: string): number {
    const segments = pointerToSegments(pointer);
    for (let i = segments.length; i >= 0; i--) {
      const node = document.getIn(segments.slice(0, i), true);
      if (yaml.isNode(node) && node.range) {
        return lineCounter.linePos(node.range[0]).line;
      }
    }
    return 1;
  }
}
