import * as fs from 'fs';
import * as path from 'path';
import { getDefaultConfig, loadConfig, mergeConfig, validateConfig } from './index';
import { DEFAULT_LINT_CONFIG, parseLintConfig } from '../core/yaml-lint';
import { MemoryLogger } from '../core/logger';
import { MessageFormat, Severity } from '../types';

// Mock fs module
jest.mock('fs');

const mockConfigFile = (relative: string, content: string): void => {
  const configPath = path.resolve('/some/path', relative);
  jest.mocked(fs.existsSync).mockImplementation((p) => String(p) === configPath);
  jest.mocked(fs.readFileSync).mockReturnValue(content);
};

describe('config', () => {
  let logger: MemoryLogger;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = new MemoryLogger();
  });

  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig();

      expect(config).toEqual({
        taxonomyFolders: ['compositional_skills', 'knowledge'],
        schemaVersion: undefined,
        lintConfig: DEFAULT_LINT_CONFIG,
        lintStrict: false,
        messageFormat: MessageFormat.Auto,
      });
    });

    it('should return independent copies', () => {
      getDefaultConfig().taxonomyFolders.push('extra');

      expect(getDefaultConfig().taxonomyFolders).toEqual(['compositional_skills', 'knowledge']);
    });
  });

  describe('loadConfig', () => {
    it('should return default config when no file exists', () => {
      jest.mocked(fs.existsSync).mockReturnValue(false);

      const config = loadConfig('/some/path', logger);

      expect(config).toEqual(getDefaultConfig());
      expect(fs.readFileSync).not.toHaveBeenCalled();
    });

    it('should load and merge config from file', () => {
      mockConfigFile(
        '.taxonomy-schema/config.yml',
        `
taxonomyFolders:
  - skills
schemaVersion: 2
lintStrict: true
messageFormat: GitHub
`
      );

      const config = loadConfig('/some/path', logger);

      expect(config.taxonomyFolders).toEqual(['skills']);
      expect(config.schemaVersion).toBe(2);
      expect(config.lintStrict).toBe(true);
      expect(config.messageFormat).toBe(MessageFormat.Github);
      expect(config.lintConfig).toBe(DEFAULT_LINT_CONFIG);
    });

    it('should search the later config paths', () => {
      mockConfigFile('taxonomy-schema.yaml', 'lintStrict: true\n');

      expect(loadConfig('/some/path', logger).lintStrict).toBe(true);
    });

    it('should accept an inline lint configuration mapping', () => {
      mockConfigFile(
        'taxonomy-schema.yml',
        `
lintConfig:
  extends: relaxed
  rules:
    line-length:
      max: 100
`
      );

      const config = loadConfig('/some/path', logger);

      expect(parseLintConfig(config.lintConfig)['line-length']).toEqual({
        level: Severity.Warning,
        max: 100,
        allowNonBreakableWords: true,
      });
    });

    it('should ignore values of the wrong type', () => {
      mockConfigFile(
        '.taxonomy-schema/config.yaml',
        `
schemaVersion: two
messageFormat: xml
lintStrict: yes please
`
      );

      const config = loadConfig('/some/path', logger);

      expect(config).toEqual(getDefaultConfig());
    });

    it('should fallback to default on parse error', () => {
      mockConfigFile('.taxonomy-schema/config.yml', 'invalid: yaml: content: [');

      const config = loadConfig('/some/path', logger);

      expect(config).toEqual(getDefaultConfig());
      expect(logger.messages('warn')).toHaveLength(1);
      expect(logger.messages('warn')[0]).toMatch(
        /^Warning: Failed to parse config at \/some\/path\/\.taxonomy-schema\/config\.yml: /
      );
    });
  });

  describe('mergeConfig', () => {
    it('should let the override win key by key', () => {
      const defaults = getDefaultConfig();

      const merged = mergeConfig(defaults, { messageFormat: MessageFormat.Logging, schemaVersion: 0 });

      expect(merged.messageFormat).toBe(MessageFormat.Logging);
      expect(merged.schemaVersion).toBe(0);
      expect(merged.lintStrict).toBe(false);
      expect(merged.taxonomyFolders).toEqual(defaults.taxonomyFolders);
      expect(merged.taxonomyFolders).not.toBe(defaults.taxonomyFolders);
    });
  });

  describe('validateConfig', () => {
    it('should accept the default configuration', () => {
      expect(validateConfig(getDefaultConfig())).toEqual([]);
    });

    it('should require a taxonomy folder', () => {
      const config = { ...getDefaultConfig(), taxonomyFolders: [] };

      expect(validateConfig(config)).toEqual(['At least one taxonomy folder must be configured.']);
    });

    it('should reject folder names with separators', () => {
      const config = { ...getDefaultConfig(), taxonomyFolders: ['knowledge', 'a/b'] };

      expect(validateConfig(config)).toEqual(['Invalid taxonomy folder names: a/b.']);
    });

    it('should reject a fractional schema version', () => {
      const config = { ...getDefaultConfig(), schemaVersion: 1.5 };

      expect(validateConfig(config)).toEqual(['Invalid schema version: 1.5. Must be an integer.']);
    });

    it('should reject an invalid lint configuration', () => {
      const config = { ...getDefaultConfig(), lintConfig: '{extends: strict}' };

      expect(validateConfig(config)).toEqual([
        'Invalid lint configuration: Unknown lint preset "strict"',
      ]);
    });
  });
});
