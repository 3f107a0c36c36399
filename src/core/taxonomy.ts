import * as path from 'path';
import {
  JsonObject,
  MessageFormat,
  MessageLocation,
  Severity,
  TaxonomyMessage,
} from '../types';
import { Logger, defaultLogger } from './logger';

export type ResolvedMessageFormat = Exclude<MessageFormat, MessageFormat.Auto>;

/**
 * Resolve Auto to Github inside a GitHub Actions workflow run, Standard elsewhere
 */
export function resolveMessageFormat(
  format: MessageFormat,
  env: NodeJS.ProcessEnv = process.env
): ResolvedMessageFormat {
  if (format !== MessageFormat.Auto) return format;
  return 'GITHUB_ACTIONS' in env && 'GITHUB_WORKFLOW' in env
    ? MessageFormat.Github
    : MessageFormat.Standard;
}

/**
 * Accepts the enum or its name in any case ("LOGGING", "logging")
 */
export function parseMessageFormat(value: MessageFormat | string): MessageFormat {
  const normalized = value.toLowerCase();
  const format = Object.values(MessageFormat).find((f) => f === normalized);
  if (!format) {
    throw new Error(
      `Unknown message format "${value}". Expected one of: ${Object.values(MessageFormat).join(', ')}`
    );
  }
  return format;
}

export interface TaxonomyInit {
  /** Path starting at the taxonomy folder holding the file */
  path: string;
  absPath: string;
  messageFormat: MessageFormat;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

/**
 * A parsed taxonomy qna.yaml file and everything reported about it
 */
export class Taxonomy {
  readonly path: string;
  /** Relative to the working directory when the file is inside it, absolute otherwise */
  readonly relPath: string;
  readonly messageFormat: ResolvedMessageFormat;
  readonly messages: TaxonomyMessage[] = [];
  errors = 0;
  warnings = 0;
  parsed: JsonObject = {};
  version = 0;
  private readonly logger: Logger;

  constructor(init: TaxonomyInit) {
    this.path = init.path;
    const absPath = path.resolve(init.absPath);
    const relative = path.relative(process.cwd(), absPath);
    this.relPath = relative.startsWith('..') || path.isAbsolute(relative) ? absPath : relative;
    this.messageFormat = resolveMessageFormat(init.messageFormat, init.env);
    this.logger = init.logger ?? defaultLogger;
  }

  error(message: string, location: MessageLocation = {}): this {
    this.errors++;
    this.report(Severity.Error, message, location);
    return this;
  }

  warning(message: string, location: MessageLocation = {}): this {
    this.warnings++;
    this.report(Severity.Warning, message, location);
    return this;
  }

  private report(severity: Severity, message: string, location: MessageLocation): void {
    const line = location.line ?? 1;
    const col = location.col ?? 1;
    const yamlPath = location.yamlPath ?? '';
    this.messages.push({ severity, message, line, col, yamlPath });

    const scoped = yamlPath ? `[${yamlPath}] ${message}` : message;
    const isError = severity === Severity.Error;

    switch (this.messageFormat) {
      case MessageFormat.Github:
        this.logger.log(
          `::${isError ? 'error' : 'warning'} file=${this.relPath},line=${line},col=${col}::${line}:${col} ${scoped}`
        );
        break;
      case MessageFormat.Logging: {
        const text = `${this.relPath}:${line}:${col} ${scoped}`;
        if (isError) {
          this.logger.error(text);
        } else {
          this.logger.warn(text);
        }
        break;
      }
      case MessageFormat.Standard:
        this.logger.log(`${isError ? 'ERROR' : 'WARN'}: ${this.relPath}:${line}:${col} ${scoped}`);
        break;
    }
  }
}
