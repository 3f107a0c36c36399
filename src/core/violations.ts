import type { ErrorObject } from 'ajv';
import { Violation, ViolationKind } from '../types';

/**
 * Keywords whose error names a property that is not (yet) part of the instance location.
 * The property is appended so the violation points at the field itself.
 */
const PROPERTY_PARAM: Record<string, string> = {
  required: 'missingProperty',
  unevaluatedProperties: 'unevaluatedProperty',
  additionalProperties: 'additionalProperty',
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const INDEX = /^\d+$/;

function escapeSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

function unescapeSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Split a JSON pointer into its unescaped segments. `''` is the root and has none.
 */
export function pointerToSegments(pointer: string): string[] {
  if (pointer === '') return [];
  return pointer.split('/').slice(1).map(unescapeSegment);
}

export function segmentsToPointer(segments: string[]): string {
  return segments.map((s) => `/${escapeSegment(s)}`).join('');
}

/**
 * Render segments as a yq-style path: `.seed_examples[2].answer`, `.` for the root.
 */
export function toYamlPath(segments: string[]): string {
  if (segments.length === 0) return '.';
  return segments
    .map((s) => {
      if (INDEX.test(s)) return `[${s}]`;
      if (IDENTIFIER.test(s)) return `.${s}`;
      return `[${JSON.stringify(s)}]`;
    })
    .join('');
}

function stringParam(params: Record<string, unknown>, name: string): string | undefined {
  const value = params[name];
  return typeof value === 'string' ? value : undefined;
}

function describeError(error: ErrorObject, property: string | undefined): string {
  switch (error.keyword) {
    case 'required':
      return `'${property}' is a required property`;
    case 'unevaluatedProperties':
      return `Unevaluated properties are not allowed ('${property}' was unexpected)`;
    case 'additionalProperties':
      return `Additional properties are not allowed ('${property}' was unexpected)`;
    case 'minItems':
      return `Value must have at least ${String(error.params.limit)} items`;
    default:
      return error.message ?? `failed the ${error.keyword} constraint`;
  }
}

/**
 * Convert one validator error into a Violation
 */
export function toViolation(error: ErrorObject, kind: ViolationKind): Violation {
  const params: Record<string, unknown> = { ...error.params };
  const segments = pointerToSegments(error.instancePath);

  const paramName = PROPERTY_PARAM[error.keyword];
  const property = paramName ? stringParam(params, paramName) : undefined;
  if (property !== undefined) {
    segments.push(property);
  }

  return {
    kind,
    keyword: error.keyword,
    pointer: segmentsToPointer(segments),
    path: toYamlPath(segments),
    message: describeError(error, property),
    schemaPath: error.schemaPath,
    params,
  };
}

export function toViolations(
  errors: ErrorObject[] | null | undefined,
  kind: ViolationKind
): Violation[] {
  return (errors ?? []).map((e) => toViolation(e, kind));
}

/**
 * One-line rendering used by the CLI
 */
export function formatViolation(violation: Violation): string {
  return `[${violation.path}] ${violation.message}`;
}
