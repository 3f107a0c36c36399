import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonObject } from '../../src/types';

export const TESTDATA = path.join(__dirname, '..', 'testdata');

/**
 * Distinct seed examples: "Question 1?" / "Answer 1.", "Question 2?" / ...
 */
export function seedExamples(count: number): JsonObject[] {
  return Array.from({ length: count }, (_, i) => ({
    question: `Question ${i + 1}?`,
    answer: `Answer ${i + 1}.`,
  }));
}

/**
 * A minimal valid compositional skill; fields can be replaced or added
 */
export function skillDocument(overrides: JsonObject = {}): JsonObject {
  return {
    created_by: 'alice',
    task_description: 'desc',
    seed_examples: seedExamples(5),
    ...overrides,
  };
}

export function without(document: JsonObject, key: string): JsonObject {
  const copy = { ...document };
  delete copy[key];
  return copy;
}

/**
 * A fresh directory under the OS temp dir, removed by the returned cleanup
 */
export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taxonomy-schema-'));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

export function writeFile(dir: string, relative: string, content: string): string {
  const filePath = path.join(dir, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}
