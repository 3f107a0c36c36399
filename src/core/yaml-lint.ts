import * as os from 'os';
import * as yaml from 'yaml';
import {
  EmptyLinesRule,
  LevelRule,
  LineLengthRule,
  LintConfig,
  LintLevel,
  LintProblem,
  LintRuleName,
  NewLineType,
  NewLinesRule,
  Severity,
} from '../types';
import { LintConfigError } from './errors';

/**
 * Lint configuration applied when none is given
 */
export const DEFAULT_LINT_CONFIG = '{extends: relaxed, rules: {line-length: {max: 120}}}';

type PresetName = 'default' | 'relaxed';

const PRESETS: Record<PresetName, LintConfig> = {
  default: {
    'line-length': { level: Severity.Error, max: 80, allowNonBreakableWords: true },
    'trailing-spaces': { level: Severity.Error },
    'new-line-at-end-of-file': { level: Severity.Error },
    'key-duplicates': { level: Severity.Error },
    'empty-lines': { level: Severity.Error, max: 2, maxStart: 0, maxEnd: 0 },
    'new-lines': { level: Severity.Error, type: 'unix' },
  },
  relaxed: {
    'line-length': { level: Severity.Warning, max: 80, allowNonBreakableWords: true },
    'trailing-spaces': { level: Severity.Error },
    'new-line-at-end-of-file': { level: Severity.Error },
    'key-duplicates': { level: Severity.Error },
    'empty-lines': { level: Severity.Warning, max: 2, maxStart: 0, maxEnd: 0 },
    'new-lines': { level: Severity.Error, type: 'unix' },
  },
};

const RULE_NAMES: LintRuleName[] = [
  'line-length',
  'trailing-spaces',
  'new-line-at-end-of-file',
  'key-duplicates',
  'empty-lines',
  'new-lines',
];

/**
 * yamllint rules that are accepted in a configuration but not checked
 */
const IGNORED_RULE_NAMES = [
  'anchors',
  'braces',
  'brackets',
  'colons',
  'commas',
  'comments',
  'comments-indentation',
  'document-end',
  'document-start',
  'empty-values',
  'float-values',
  'hyphens',
  'indentation',
  'key-ordering',
  'octal-values',
  'quoted-strings',
  'truthy',
];

const NEW_LINE_TYPES: NewLineType[] = ['unix', 'dos', 'platform'];

function isRuleName(name: string): name is LintRuleName {
  return RULE_NAMES.some((rule) => rule === name);
}

function isNewLineType(value: unknown): value is NewLineType {
  return NEW_LINE_TYPES.some((t) => t === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clonePreset(name: PresetName): LintConfig {
  const preset = PRESETS[name];
  return {
    'line-length': { ...preset['line-length'] },
    'trailing-spaces': { ...preset['trailing-spaces'] },
    'new-line-at-end-of-file': { ...preset['new-line-at-end-of-file'] },
    'key-duplicates': { ...preset['key-duplicates'] },
    'empty-lines': { ...preset['empty-lines'] },
    'new-lines': { ...preset['new-lines'] },
  };
}

function parseLevel(rule: string, value: unknown): LintLevel {
  if (value === Severity.Error || value === Severity.Warning) return value;
  throw new LintConfigError(`Invalid level for rule "${rule}": ${String(value)}`);
}

function integerOption(rule: LintRuleName, option: string, value: unknown, min: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    const kind = min > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new LintConfigError(`Option "${option}" of rule "${rule}" must be ${kind}`);
  }
  return value;
}

function applyLineLength(rule: LineLengthRule, options: Record<string, unknown>): void {
  if (options.max !== undefined) {
    rule.max = integerOption('line-length', 'max', options.max, 1);
  }
  const allow = options['allow-non-breakable-words'];
  if (allow !== undefined) {
    if (typeof allow !== 'boolean') {
      throw new LintConfigError(
        `Option "allow-non-breakable-words" of rule "line-length" must be a boolean`
      );
    }
    rule.allowNonBreakableWords = allow;
  }
}

function applyEmptyLines(rule: EmptyLinesRule, options: Record<string, unknown>): void {
  if (options.max !== undefined) {
    rule.max = integerOption('empty-lines', 'max', options.max, 0);
  }
  if (options['max-start'] !== undefined) {
    rule.maxStart = integerOption('empty-lines', 'max-start', options['max-start'], 0);
  }
  if (options['max-end'] !== undefined) {
    rule.maxEnd = integerOption('empty-lines', 'max-end', options['max-end'], 0);
  }
}

function applyNewLines(rule: NewLinesRule, options: Record<string, unknown>): void {
  if (options.type === undefined) return;
  if (!isNewLineType(options.type)) {
    throw new LintConfigError(
      `Option "type" of rule "new-lines" must be one of: ${NEW_LINE_TYPES.join(', ')}`
    );
  }
  rule.type = options.type;
}

function applyRule(
  config: LintConfig,
  base: LintConfig,
  rule: LintRuleName,
  value: unknown
): void {
  const target: LevelRule = config[rule];

  if (value === 'disable') {
    target.level = 'disable';
    return;
  }
  if (value === 'enable') {
    target.level = base[rule].level === 'disable' ? Severity.Error : base[rule].level;
    return;
  }
  if (!isRecord(value)) {
    throw new LintConfigError(`Rule "${rule}" must be "enable", "disable" or a mapping`);
  }

  if (target.level === 'disable') {
    target.level = Severity.Error;
  }
  if (value.level !== undefined) {
    target.level = parseLevel(rule, value.level);
  }

  switch (rule) {
    case 'line-length':
      applyLineLength(config['line-length'], value);
      break;
    case 'empty-lines':
      applyEmptyLines(config['empty-lines'], value);
      break;
    case 'new-lines':
      applyNewLines(config['new-lines'], value);
      break;
  }
}

/**
 * Read a yamllint-style configuration, e.g.
 * `{extends: relaxed, rules: {line-length: {max: 120}, trailing-spaces: disable}}`
 */
export function parseLintConfig(text: string = DEFAULT_LINT_CONFIG): LintConfig {
  let raw: unknown;
  try {
    raw = yaml.parse(text);
  } catch (error) {
    throw new LintConfigError(`Lint configuration is not valid YAML: ${text}`, { cause: error });
  }
  if (raw === null || raw === undefined) {
    return clonePreset('default');
  }
  if (!isRecord(raw)) {
    throw new LintConfigError('Lint configuration must be a mapping');
  }

  const preset = raw.extends ?? 'default';
  if (preset !== 'default' && preset !== 'relaxed') {
    throw new LintConfigError(`Unknown lint preset "${String(preset)}"`);
  }
  const base = PRESETS[preset];
  const config = clonePreset(preset);

  if (raw.rules === undefined || raw.rules === null) return config;
  if (!isRecord(raw.rules)) {
    throw new LintConfigError('Lint configuration "rules" must be a mapping');
  }
  for (const [name, value] of Object.entries(raw.rules)) {
    if (isRuleName(name)) {
      applyRule(config, base, name, value);
    } else if (!IGNORED_RULE_NAMES.includes(name)) {
      throw new LintConfigError(`Unknown lint rule "${name}"`);
    }
  }
  return config;
}

export interface ParsedYaml {
  document: yaml.Document.Parsed;
  lineCounter: yaml.LineCounter;
}

export function parseYaml(content: string): ParsedYaml {
  const lineCounter = new yaml.LineCounter();
  const document = yaml.parseDocument(content, { lineCounter, prettyErrors: false });
  return { document, lineCounter };
}

/**
 * A line has no breakable space once its indentation and any leading
 * comment marker or sequence dash are skipped.
 */
function isNonBreakable(line: string): boolean {
  let start = 0;
  while (start < line.length && line[start] === ' ') start++;
  if (start === line.length) return false;

  if (line[start] === '#') {
    while (line[start] === '#') start++;
    start++;
  } else if (line[start] === '-') {
    start += 2;
  }
  return line.indexOf(' ', start) === -1;
}

/**
 * Offset of the first non-whitespace character at or after `offset`
 */
function skipWhitespace(content: string, offset: number): number {
  let i = offset;
  while (i < content.length && /\s/.test(content[i])) i++;
  return i;
}

function duplicateKey(content: string, offset: number): string {
  return content.slice(offset).split(/[:\n]/)[0].trim();
}

// Columns and lengths count characters, not UTF-16 units
function codePoints(text: string): number {
  return [...text].length;
}

type Report = (
  rule: LintRuleName,
  level: LintLevel,
  line: number,
  col: number,
  message: string
) => void;

const isBlank = (line: string): boolean => line === '' || line === '\r';

/**
 * Reports the last line of each run of blank lines longer than allowed.
 * Runs at the start and at the end of the file have their own limits.
 */
function checkEmptyLines(content: string, rule: EmptyLinesRule, report: Report): void {
  const parts = content.split('\n');
  // Lines followed by a line break; the text after the last break is not a blank line
  const terminated = parts.slice(0, -1);
  const endsWithBreak = parts[parts.length - 1] === '';
  if (content === '\n') return;

  let run = 0;
  terminated.forEach((line, index) => {
    if (!isBlank(line)) {
      run = 0;
      return;
    }
    run++;
    if (index + 1 < terminated.length && isBlank(terminated[index + 1])) return;

    let max = rule.max;
    if (run === index + 1) max = rule.maxStart;
    if (index === terminated.length - 1 && endsWithBreak) max = rule.maxEnd;

    if (run > max) {
      report('empty-lines', rule.level, index + 1, 1, `too many blank lines (${run} > ${max})`);
    }
  });
}

const NEW_LINE_CHARACTERS: Record<NewLineType, string> = {
  unix: '\n',
  dos: '\r\n',
  platform: os.EOL,
};

/**
 * Checks the line break that ends the first line
 */
function checkNewLines(content: string, rule: NewLinesRule, report: Report): void {
  const lineBreak = content.indexOf('\n');
  if (lineBreak === -1) return;

  const end = lineBreak > 0 && content[lineBreak - 1] === '\r' ? lineBreak - 1 : lineBreak;
  const expected = NEW_LINE_CHARACTERS[rule.type];
  if (content.slice(end, end + expected.length) !== expected) {
    const shown = expected.replace(/\r/g, '\\r').replace(/\n/g, '\\n');
    report(
      'new-lines',
      rule.level,
      1,
      codePoints(content.slice(0, end)) + 1,
      `wrong new line character: expected ${shown}`
    );
  }
}

/**
 * Lint YAML text. Problems are sorted by line, then column.
 */
export function lintYaml(
  content: string,
  config: LintConfig,
  parsed: ParsedYaml = parseYaml(content)
): LintProblem[] {
  const problems: LintProblem[] = [];
  const report: Report = (rule, level, line, col, message) => {
    if (level === 'disable') return;
    problems.push({ line, col, level, rule, message });
  };

  for (const error of parsed.document.errors) {
    if (error.code === 'DUPLICATE_KEY') {
      const keyOffset = skipWhitespace(content, error.pos[0]);
      const { line, col } = parsed.lineCounter.linePos(keyOffset);
      report(
        'key-duplicates',
        config['key-duplicates'].level,
        line,
        col,
        `duplication of key "${duplicateKey(content, keyOffset)}" in mapping`
      );
    } else {
      const { line, col } = parsed.lineCounter.linePos(error.pos[0]);
      problems.push({
        line,
        col,
        level: Severity.Error,
        rule: 'syntax',
        message: `syntax error: ${error.message}`,
      });
    }
  }

  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  const lineLength = config['line-length'];
  lines.forEach((raw, index) => {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    const lineNo = index + 1;
    const length = codePoints(line);

    if (length > lineLength.max && !(lineLength.allowNonBreakableWords && isNonBreakable(line))) {
      report(
        'line-length',
        lineLength.level,
        lineNo,
        lineLength.max + 1,
        `line too long (${length} > ${lineLength.max} characters)`
      );
    }

    const trimmed = line.replace(/[ \t]+$/, '');
    if (trimmed.length !== line.length) {
      report(
        'trailing-spaces',
        config['trailing-spaces'].level,
        lineNo,
        codePoints(trimmed) + 1,
        'trailing spaces'
      );
    }
  });

  if (content.length > 0 && !content.endsWith('\n')) {
    report(
      'new-line-at-end-of-file',
      config['new-line-at-end-of-file'].level,
      lines.length,
      codePoints(lines[lines.length - 1]) + 1,
      'no new line character at the end of file'
    );
  }

  checkEmptyLines(content, config['empty-lines'], report);
  checkNewLines(content, config['new-lines'], report);

  return problems.sort((a, b) => a.line - b.line || a.col - b.col);
}
