import Ajv2020 from 'ajv/dist/2020';
import { MissingRefError } from 'ajv';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { META_SCHEMA_URI, SCHEMA_BASE, VERSION_DIR_PATTERN } from '../config/schema-paths';
import {
  JsonObject,
  SchemaDocument,
  SchemaVersion,
  ValidationResult,
  ViolationKind,
} from '../types';
import { SchemaLoadError } from './errors';
import { toViolations } from './violations';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function createAjv(): Ajv2020 {
  // Schemas are meta-validated explicitly before they are compiled
  const ajv = new Ajv2020({ allErrors: true, strict: false, validateSchema: false });
  addFormats(ajv);
  return ajv;
}

function metaValidator(ajv: Ajv2020): ValidateFunction {
  const validate = ajv.getSchema(META_SCHEMA_URI);
  if (!validate) {
    throw new Error(`Meta-schema ${META_SCHEMA_URI} is not bundled with the validator`);
  }
  return validate;
}

function result(violations: ValidationResult['violations']): ValidationResult {
  return { valid: violations.length === 0, violations };
}

function copyResult({ valid, violations }: ValidationResult): ValidationResult {
  return { valid, violations: violations.map((v) => ({ ...v, params: { ...v.params } })) };
}

function runMeta(ajv: Ajv2020, contents: unknown): ValidationResult {
  const validate = metaValidator(ajv);
  validate(contents);
  return result(toViolations(validate.errors, ViolationKind.MetaSchema));
}

/**
 * Collect every `$ref` in a schema that points outside the document itself.
 */
export function externalRefs(contents: unknown): string[] {
  const refs = new Set<string>();
  const walk = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(walk);
      return;
    }
    if (!isJsonObject(node)) return;
    for (const [key, value] of Object.entries(node)) {
      if (key === '$ref' && typeof value === 'string' && !value.startsWith('#')) {
        refs.add(value);
      } else {
        walk(value);
      }
    }
  };
  walk(contents);
  return [...refs];
}

function compile(ajv: Ajv2020, contents: JsonObject, uri: string | undefined, ref: string): ValidateFunction {
  try {
    if (uri === undefined) return ajv.compile(contents);
    const validate = ajv.getSchema(uri);
    if (!validate) throw new SchemaLoadError(ref, `Schema ${uri} is not registered`);
    return validate;
  } catch (error) {
    if (error instanceof MissingRefError) {
      throw new SchemaLoadError(error.missingRef, error.message, { cause: error });
    }
    throw error;
  }
}

/**
 * Validate a schema object against the generic draft 2020-12 meta-schema.
 */
export function validateSchemaItself(schema: unknown): ValidationResult {
  return runMeta(createAjv(), schema);
}

/**
 * Validate a candidate against an in-memory schema.
 *
 * `references` are registered under their URIs first, so a schema passed with its own
 * `uri` can reach them through relative `$ref`s. When the schema or any reference is
 * malformed, the first one's meta-schema violations are returned and the candidate is
 * not evaluated.
 */
export function validateInstance(
  schema: JsonObject,
  candidate: unknown,
  references: SchemaDocument[] = [],
  uri?: string
): ValidationResult {
  const ajv = createAjv();
  for (const contents of [schema, ...references.map((r) => r.contents)]) {
    const meta = runMeta(ajv, contents);
    if (!meta.valid) return meta;
  }

  for (const reference of references) {
    ajv.addSchema(reference.contents, reference.uri);
  }
  if (uri !== undefined) {
    ajv.addSchema(schema, uri);
  }

  const validate = compile(ajv, schema, uri, uri ?? '<inline>');
  validate(candidate);
  return result(toViolations(validate.errors, ViolationKind.Instance));
}

/**
 * The versioned schema documents shipped in a schema base directory.
 *
 * Documents are read lazily and cached; compiled validators are cached per document URI.
 */
export class SchemaRepository {
  private readonly base: string;
  private readonly ajv: Ajv2020;
  private readonly documents = new Map<string, SchemaDocument>();
  private readonly registered = new Set<string>();
  private readonly metaResults = new Map<string, ValidationResult>();

  constructor(base: string = SCHEMA_BASE) {
    this.base = path.resolve(base);
    this.ajv = createAjv();
  }

  schemaBase(): string {
    return this.base;
  }

  /**
   * Version directories, sorted by version number
   */
  schemaVersions(): SchemaVersion[] {
    if (!fs.existsSync(this.base)) return [];

    return fs
      .readdirSync(this.base, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && VERSION_DIR_PATTERN.test(entry.name))
      .map((entry) => ({
        name: entry.name,
        version: parseInt(entry.name.slice(1), 10),
        path: path.join(this.base, entry.name),
      }))
      .sort((a, b) => a.version - b.version);
  }

  latestVersion(): number {
    const versions = this.schemaVersions();
    if (versions.length === 0) {
      throw new SchemaLoadError(
        this.base,
        `Schema base "${this.base}" does not contain any schema versions`
      );
    }
    return versions[versions.length - 1].version;
  }

  /**
   * Document kinds available in a version, e.g. `compositional_skills`
   */
  schemaNames(version: number): string[] {
    const dir = path.join(this.base, `v${version}`);
    if (!fs.existsSync(dir)) return [];

    return fs
      .readdirSync(dir)
      .filter((file) => file.endsWith('.json'))
      .map((file) => file.slice(0, -'.json'.length))
      .sort();
  }

  loadSchema(version: number, name: string): SchemaDocument {
    return this.loadSchemaFile(path.join(this.base, `v${version}`, `${name}.json`));
  }

  /**
   * Load any schema file. Files outside the schema base get version 0.
   */
  loadSchemaFile(filePath: string): SchemaDocument {
    const absPath = path.resolve(filePath);
    const cached = this.documents.get(absPath);
    if (cached) return cached;

    const ref = this.refFor(absPath);
    let text: string;
    try {
      text = fs.readFileSync(absPath, 'utf-8');
    } catch (error) {
      throw new SchemaLoadError(ref, `Cannot read ${absPath}`, { cause: error });
    }

    let contents: unknown;
    try {
      contents = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaLoadError(ref, `Invalid JSON in ${ref}: ${reason}`, { cause: error });
    }
    if (!isJsonObject(contents)) {
      throw new SchemaLoadError(ref, `Schema ${ref} is not a JSON object`);
    }

    const dirMatch = VERSION_DIR_PATTERN.exec(path.basename(path.dirname(absPath)));
    const document: SchemaDocument = {
      uri: pathToFileURL(absPath).href,
      ref,
      version: dirMatch ? parseInt(dirMatch[1], 10) : 0,
      name: path.basename(absPath, '.json'),
      contents,
    };
    this.documents.set(absPath, document);
    return document;
  }

  validateSchemaItself(document: SchemaDocument): ValidationResult {
    let meta = this.metaResults.get(document.uri);
    if (!meta) {
      meta = runMeta(this.ajv, document.contents);
      this.metaResults.set(document.uri, meta);
    }
    return copyResult(meta);
  }

  /**
   * Validate a candidate against a repository document, resolving its sibling `$ref`s.
   * The document and every document it references are meta-validated first; the first
   * malformed one yields its meta-schema violations.
   */
  validateInstance(document: SchemaDocument, candidate: unknown): ValidationResult {
    const documents = this.referencedDocuments(document);
    for (const each of documents) {
      const meta = this.validateSchemaItself(each);
      if (!meta.valid) return meta;
    }

    for (const each of documents) {
      if (this.registered.has(each.uri)) continue;
      this.ajv.addSchema(each.contents, each.uri);
      this.registered.add(each.uri);
    }
    const validate = compile(this.ajv, document.contents, document.uri, document.ref);
    validate(candidate);
    return result(toViolations(validate.errors, ViolationKind.Instance));
  }

  /**
   * The document followed by every file it reaches through `$ref`, each once
   */
  private referencedDocuments(
    document: SchemaDocument,
    found: Map<string, SchemaDocument> = new Map()
  ): SchemaDocument[] {
    if (found.has(document.uri)) return [...found.values()];
    found.set(document.uri, document);

    for (const ref of externalRefs(document.contents)) {
      const target = new URL(ref, document.uri);
      if (target.protocol !== 'file:') continue;
      target.hash = '';
      this.referencedDocuments(this.loadSchemaFile(fileURLToPath(target)), found);
    }
    return [...found.values()];
  }

  private refFor(absPath: string): string {
    const relative = path.relative(this.base, absPath);
    if (relative.startsWith('..') || path.isAbsolute(relative)) return absPath;
    return relative.split(path.sep).join('/');
  }
}

let defaultRepository: SchemaRepository | undefined;

export function getDefaultRepository(): SchemaRepository {
  if (!defaultRepository) {
    defaultRepository = new SchemaRepository();
  }
  return defaultRepository;
}

/**
 * The directory holding the packaged schema versions
 */
export function schemaBase(): string {
  return getDefaultRepository().schemaBase();
}

/**
 * The packaged schema versions, sorted by version number
 */
export function schemaVersions(): SchemaVersion[] {
  return getDefaultRepository().schemaVersions();
}
