import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadEnvFiles, readBool, readInt, readList, readString } from '../src/env/loaders.js';

describe('env utilities', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('readBool', () => {
    it('returns default when env var is not set', () => {
      expect(readBool('NONEXISTENT_VAR', true)).toBe(true);
      expect(readBool('NONEXISTENT_VAR', false)).toBe(false);
    });

    it('accepts "1" and "true" in any case', () => {
      process.env.TEST_BOOL = '1';
      expect(readBool('TEST_BOOL', false)).toBe(true);
      process.env.TEST_BOOL = 'TRUE';
      expect(readBool('TEST_BOOL', false)).toBe(true);
    });

    it('returns false for other values', () => {
      process.env.TEST_BOOL = '0';
      expect(readBool('TEST_BOOL', true)).toBe(false);
      process.env.TEST_BOOL = 'no';
      expect(readBool('TEST_BOOL', true)).toBe(false);
    });

    it('returns default for empty string', () => {
      process.env.TEST_BOOL = '';
      expect(readBool('TEST_BOOL', true)).toBe(true);
    });
  });

  describe('readInt', () => {
    it('returns default when env var is not set', () => {
      expect(readInt('NONEXISTENT_VAR', 42)).toBe(42);
    });

    it('parses valid integers', () => {
      process.env.TEST_INT = '123';
      expect(readInt('TEST_INT', 0)).toBe(123);
    });

    it('returns default for non-integer values', () => {
      process.env.TEST_INT = 'not a number';
      expect(readInt('TEST_INT', 42)).toBe(42);
      process.env.TEST_INT = '1.5';
      expect(readInt('TEST_INT', 42)).toBe(42);
    });
  });

  describe('readString', () => {
    it('returns env var value when set', () => {
      process.env.TEST_STRING = 'hello';
      expect(readString('TEST_STRING', 'default')).toBe('hello');
    });

    it('returns default for empty string', () => {
      process.env.TEST_STRING = '';
      expect(readString('TEST_STRING', 'default')).toBe('default');
    });

    it('returns undefined when no default provided and var not set', () => {
      expect(readString('NONEXISTENT_VAR')).toBeUndefined();
    });
  });

  describe('readList', () => {
    it('splits, trims and drops blank entries', () => {
      process.env.TEST_LIST = ' mp3, wav ,,flac ';
      expect(readList('TEST_LIST')).toEqual(['mp3', 'wav', 'flac']);
    });

    it('returns default when unset or blank', () => {
      expect(readList('NONEXISTENT_VAR', ['a'])).toEqual(['a']);
      process.env.TEST_LIST = '   ';
      expect(readList('TEST_LIST', ['b'])).toEqual(['b']);
    });
  });

  describe('loadEnvFiles', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = join(tmpdir(), `setsplit-env-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('loads variables from .env file without touching process.env when asked', () => {
      writeFileSync(join(testDir, '.env'), 'TEST_VAR=test_value\nANOTHER_VAR=another_value');

      const result = loadEnvFiles({ cwd: testDir, assignToProcess: false });

      expect(result.values).toEqual({ TEST_VAR: 'test_value', ANOTHER_VAR: 'another_value' });
      expect(result.assignedKeys).toEqual([]);
      expect(process.env.TEST_VAR).toBeUndefined();
    });

    it('assigns variables to process.env by default', () => {
      writeFileSync(join(testDir, '.env'), 'PROCESS_VAR=process_value');

      const result = loadEnvFiles({ cwd: testDir });

      expect(process.env.PROCESS_VAR).toBe('process_value');
      expect(result.assignedKeys).toEqual(['PROCESS_VAR']);
    });

    it('keeps existing process.env vars unless override is set', () => {
      process.env.EXISTING_VAR = 'original';
      writeFileSync(join(testDir, '.env'), 'EXISTING_VAR=new_value');

      loadEnvFiles({ cwd: testDir });
      expect(process.env.EXISTING_VAR).toBe('original');

      loadEnvFiles({ cwd: testDir, override: true });
      expect(process.env.EXISTING_VAR).toBe('new_value');
    });

    it('lets later files win over earlier ones', () => {
      writeFileSync(join(testDir, '.env'), 'SHARED=base');
      writeFileSync(join(testDir, '.env.local'), 'SHARED=local');

      const result = loadEnvFiles({
        cwd: testDir,
        files: ['.env', '.env.local'],
        assignToProcess: false,
      });

      expect(result.values.SHARED).toBe('local');
    });

    it('reports missing files', () => {
      const result = loadEnvFiles({ cwd: testDir });
      expect(result.values).toEqual({});
      expect(result.loadedFiles).toEqual([]);
      expect(result.missingFiles).toEqual([join(testDir, '.env')]);
    });
  });
});
