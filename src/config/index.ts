import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { MessageFormat, SchemaName, TaxonomyConfig } from '../types';
import { DEFAULT_LINT_CONFIG, parseLintConfig } from '../core/yaml-lint';
import { Logger, defaultLogger } from '../core/logger';

/**
 * Default configuration for the taxonomy checker
 */
const DEFAULT_CONFIG: TaxonomyConfig = {
  taxonomyFolders: [SchemaName.CompositionalSkills, SchemaName.Knowledge],
  schemaVersion: undefined, // latest
  lintConfig: DEFAULT_LINT_CONFIG,
  lintStrict: false,
  messageFormat: MessageFormat.Auto,
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.taxonomy-schema/config.yml',
  '.taxonomy-schema/config.yaml',
  'taxonomy-schema.yml',
  'taxonomy-schema.yaml',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMessageFormat(value: unknown): value is MessageFormat {
  return Object.values(MessageFormat).some((f) => f === value);
}

/**
 * Pick the recognised keys of a parsed config file. Values of the wrong type are
 * dropped here and the defaults apply; `validateConfig` checks the merged result.
 */
function readOverride(raw: unknown): Partial<TaxonomyConfig> {
  if (!isRecord(raw)) return {};

  const override: Partial<TaxonomyConfig> = {};
  if (Array.isArray(raw.taxonomyFolders)) {
    override.taxonomyFolders = raw.taxonomyFolders.filter(
      (f): f is string => typeof f === 'string'
    );
  }
  if (typeof raw.schemaVersion === 'number') {
    override.schemaVersion = raw.schemaVersion;
  }
  if (typeof raw.lintConfig === 'string') {
    override.lintConfig = raw.lintConfig;
  } else if (isRecord(raw.lintConfig)) {
    // Inline mapping in the config file; stored as text like the CLI flag
    override.lintConfig = yaml.stringify(raw.lintConfig, { collectionStyle: 'flow' }).trim();
  }
  if (typeof raw.lintStrict === 'boolean') {
    override.lintStrict = raw.lintStrict;
  }
  if (typeof raw.messageFormat === 'string') {
    const format = raw.messageFormat.toLowerCase();
    if (isMessageFormat(format)) override.messageFormat = format;
  }
  return override;
}

/**
 * Load taxonomy checker configuration from file or use defaults
 */
export function loadConfig(basePath?: string, logger: Logger = defaultLogger): TaxonomyConfig {
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed: unknown = yaml.parse(content);
        return mergeConfig(DEFAULT_CONFIG, readOverride(parsed));
      } catch (error) {
        logger.warn(`Warning: Failed to parse config at ${configPath}: ${error}`);
      }
    }
  }

  return getDefaultConfig();
}

/**
 * Merge configuration over defaults; later sources win key by key
 */
export function mergeConfig(
  defaults: TaxonomyConfig,
  override: Partial<TaxonomyConfig>
): TaxonomyConfig {
  return {
    taxonomyFolders:
      override.taxonomyFolders !== undefined
        ? [...override.taxonomyFolders]
        : [...defaults.taxonomyFolders],
    schemaVersion:
      override.schemaVersion !== undefined ? override.schemaVersion : defaults.schemaVersion,
    lintConfig: override.lintConfig !== undefined ? override.lintConfig : defaults.lintConfig,
    lintStrict: override.lintStrict !== undefined ? override.lintStrict : defaults.lintStrict,
    messageFormat:
      override.messageFormat !== undefined ? override.messageFormat : defaults.messageFormat,
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): TaxonomyConfig {
  return {
    ...DEFAULT_CONFIG,
    taxonomyFolders: [...DEFAULT_CONFIG.taxonomyFolders],
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: TaxonomyConfig): string[] {
  const errors: string[] = [];

  if (config.taxonomyFolders.length === 0) {
    errors.push('At least one taxonomy folder must be configured.');
  }

  const invalidFolders = config.taxonomyFolders.filter((f) => f === '' || /[\\/]/.test(f));
  if (invalidFolders.length > 0) {
    errors.push(`Invalid taxonomy folder names: ${invalidFolders.join(', ')}.`);
  }

  if (config.schemaVersion !== undefined && !Number.isInteger(config.schemaVersion)) {
    errors.push(`Invalid schema version: ${config.schemaVersion}. Must be an integer.`);
  }

  try {
    parseLintConfig(config.lintConfig);
  } catch (error) {
    errors.push(`Invalid lint configuration: ${error instanceof Error ? error.message : error}`);
  }

  return errors;
}

export { SCHEMA_BASE, META_SCHEMA_URI, TAXONOMY_FILE_NAME } from './schema-paths';
