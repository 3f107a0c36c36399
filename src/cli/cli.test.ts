import * as path from 'path';
import { CommandContext, runCheck, runMetaValidate, runValidate, runVersions } from './commands';
import { getDefaultConfig } from '../config';
import { MemoryLogger } from '../core/logger';
import { SchemaRepository } from '../core/schema-repository';
import { TESTDATA, makeTempDir, skillDocument, without, writeFile } from '../../tests/helpers/documents';

/**
 * CLI command tests
 *
 * The commands are plain functions over a context, so they are exercised
 * directly with an in-memory logger instead of going through commander.
 */

describe('CLI commands', () => {
  let logger: MemoryLogger;
  let ctx: CommandContext;

  beforeEach(() => {
    logger = new MemoryLogger();
    ctx = { logger, config: getDefaultConfig(), repository: new SchemaRepository() };
  });

  describe('versions', () => {
    it('should list every version with its documents', () => {
      expect(runVersions(ctx)).toBe(0);
      expect(logger.messages('log')).toEqual([
        'v1: compositional_skills, knowledge, version',
        'v2: compositional_skills, knowledge, version',
        'v3: compositional_skills, knowledge, version',
      ]);
    });

    it('should fail for an empty schema base', () => {
      const { dir, cleanup } = makeTempDir();
      try {
        ctx.repository = new SchemaRepository(dir);

        expect(runVersions(ctx)).toBe(1);
        expect(logger.messages('error')).toEqual([`No schema versions found in ${dir}`]);
      } finally {
        cleanup();
      }
    });
  });

  describe('meta-validate', () => {
    it('should validate every packaged schema', () => {
      expect(runMetaValidate([], ctx)).toBe(0);

      const lines = logger.messages('log');
      expect(lines).toHaveLength(10);
      expect(lines[0]).toBe('ok: v1/compositional_skills.json');
      expect(lines[9]).toBe('ok -- validated 9 schemas');
    });

    it('should report malformed and unreadable schema files', () => {
      const { dir, cleanup } = makeTempDir();
      try {
        const bad = writeFile(dir, 'bad.json', '{ "type": "array", "minItems": "five" }');
        const missing = path.join(dir, 'missing.json');

        expect(runMetaValidate([bad, missing], ctx)).toBe(1);
        expect(logger.messages('error')).toEqual([
          `${bad}: /minItems must be integer`,
          `${missing}: Cannot read ${missing}`,
          'Schema validation errors were encountered in 2 schemas.',
        ]);
      } finally {
        cleanup();
      }
    });
  });

  describe('check', () => {
    const skillValid = path.join(TESTDATA, 'compositional_skills/skill_valid/qna.yaml');
    const invalidYaml = path.join(TESTDATA, 'compositional_skills/invalid_yaml/qna.yaml');

    it('should succeed for valid files', () => {
      expect(runCheck([skillValid], { format: 'logging', schemaVersion: '0' }, ctx)).toBe(0);
      expect(logger.messages('log')).toEqual(['Checked 1 file: 0 errors, 0 warnings']);
    });

    it('should summarise problems across files', () => {
      const code = runCheck([skillValid, invalidYaml], { format: 'logging', schemaVersion: '0' }, ctx);

      expect(code).toBe(1);
      expect(logger.messages('error')).toHaveLength(2);
      expect(logger.messages('warn')).toHaveLength(1);
      expect(logger.messages('log')).toEqual(['Checked 2 files: 2 errors, 1 warning']);
    });

    it('should turn lint warnings into errors with lintStrict', () => {
      const code = runCheck(
        [invalidYaml],
        { format: 'logging', schemaVersion: '0', lintStrict: true },
        ctx
      );

      expect(code).toBe(1);
      expect(logger.messages('log')).toEqual(['Checked 1 file: 3 errors, 0 warnings']);
    });

    it('should reject an invalid schema version', () => {
      expect(runCheck([skillValid], { schemaVersion: 'two' }, ctx)).toBe(2);
      expect(logger.messages('error')).toEqual(['Invalid schema version: two']);
    });

    it('should reject an unknown message format', () => {
      expect(runCheck([skillValid], { format: 'xml' }, ctx)).toBe(2);
      expect(logger.messages('error')[0]).toMatch(/^Unknown message format "xml"/);
    });

    it('should reject an invalid configuration', () => {
      expect(runCheck([skillValid], { folders: ' , ' }, ctx)).toBe(2);
      expect(logger.messages('error')).toEqual(['At least one taxonomy folder must be configured.']);
    });
  });

  describe('validate', () => {
    let dir: string;
    let cleanup: () => void;

    beforeEach(() => {
      ({ dir, cleanup } = makeTempDir());
    });

    afterEach(() => {
      cleanup();
    });

    it('should accept a valid document', () => {
      const file = writeFile(dir, 'skill.json', JSON.stringify(skillDocument({ version: 2 })));

      expect(runValidate(file, { schemaVersion: '2' }, ctx)).toBe(0);
      expect(logger.messages('log')).toEqual([`${file}: valid against v2/compositional_skills.json`]);
    });

    it('should list the violations of an invalid document', () => {
      const document = without(skillDocument({ version: 2 }), 'created_by');
      const file = writeFile(dir, 'skill.json', JSON.stringify(document));

      expect(runValidate(file, { schemaVersion: '2' }, ctx)).toBe(1);
      expect(logger.messages('error')).toEqual([
        `${file}: [.created_by] 'created_by' is a required property`,
      ]);
      expect(logger.messages('log')).toEqual([
        `${file}: 1 violation against v2/compositional_skills.json`,
      ]);
    });

    it('should pick the knowledge schema and the latest version by default', () => {
      const file = writeFile(dir, 'knowledge.yaml', 'version: 3\ndocument: {}\n');

      expect(runValidate(file, {}, ctx)).toBe(1);
      expect(logger.messages('log')[0]).toMatch(/ against v3\/knowledge\.json$/);
    });

    it('should report an unknown schema kind', () => {
      const file = writeFile(dir, 'skill.json', JSON.stringify(skillDocument({ version: 2 })));

      expect(runValidate(file, { schemaVersion: '2', kind: 'recipes' }, ctx)).toBe(2);
      expect(logger.messages('error')[0]).toMatch(/^Cannot load schema file v2\/recipes\.json\. /);
    });

    it('should report an unreadable document', () => {
      const file = path.join(dir, 'missing.yaml');

      expect(runValidate(file, {}, ctx)).toBe(2);
      expect(logger.messages('error')[0]).toMatch(/^Cannot read .*missing\.yaml: /);
    });
  });
});
