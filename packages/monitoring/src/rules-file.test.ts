import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError, Severity } from '@dishwatch/core';
import { loadRulesFile } from './rules-file';

describe('loadRulesFile', () => {
  let dir: string;

  const write = (name: string, contents: string): string => {
    const path = join(dir, name);
    writeFileSync(path, contents);
    return path;
  };

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'dishwatch-rules-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should parse a list of rules', () => {
    const path = write(
      'rules.json',
      JSON.stringify([
        {
          name: 'slow_vector_search',
          metric: 'vector_search_latency',
          threshold: 0.5,
          operator: 'gte',
          duration: 120,
          severity: 'warning',
          message: 'Vector search is slow',
        },
      ])
    );

    expect(loadRulesFile(path)).toEqual([
      {
        name: 'slow_vector_search',
        metric: 'vector_search_latency',
        threshold: 0.5,
        operator: 'gte',
        duration: 120,
        severity: Severity.WARNING,
        message: 'Vector search is slow',
      },
    ]);
  });

  it('should reject a missing file', () => {
    expect(() => loadRulesFile(join(dir, 'missing.json'))).toThrow(ConfigurationError);
  });

  it('should reject invalid JSON', () => {
    const path = write('broken.json', '[{ "name": ');

    expect(() => loadRulesFile(path)).toThrow(/is not valid JSON/);
  });

  it('should list every invalid field', () => {
    const path = write(
      'invalid.json',
      JSON.stringify([{ name: 'bad', metric: 'error_rate', threshold: 1, operator: 'ne', severity: 'loud', message: 'x' }])
    );

    let caught: unknown;
    try {
      loadRulesFile(path);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^0\.operator: /);
      expect(caught.issues[1]).toMatch(/^0\.severity: /);
    }
  });

  it('should reject a document that is not a list', () => {
    const path = write('object.json', JSON.stringify({ rules: [] }));

    expect(() => loadRulesFile(path)).toThrow(ConfigurationError);
  });
});
