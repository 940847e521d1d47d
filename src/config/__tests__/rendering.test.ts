import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG_PATH,
  getDefaultRenderingConfig,
  loadRenderingConfig,
  parseRenderingConfig,
} from '../rendering.js';
import { InvalidConfigError } from '../../resume/errors.js';

describe('parseRenderingConfig', () => {
  it('fills in defaults', () => {
    expect(parseRenderingConfig({})).toEqual({ format: 'pdf', theme: 'default', pageSize: 'letter' });
    expect(getDefaultRenderingConfig()).toEqual(parseRenderingConfig(undefined));
  });

  it('coerces the timestamp to a date', () => {
    const config = parseRenderingConfig({ timestamp: '2024-01-02T03:04:05Z' });
    expect(config.timestamp?.toISOString()).toBe('2024-01-02T03:04:05.000Z');
  });

  it('reports field errors', () => {
    try {
      parseRenderingConfig({ pageSize: 'legal', format: '' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      if (err instanceof InvalidConfigError) {
        expect(Object.keys(err.issues).sort()).toEqual(['format', 'pageSize']);
        expect(err.code).toBe('INVALID_CONFIG');
      }
    }
  });

  it('reports a non-object config at the root', () => {
    try {
      parseRenderingConfig('pdf');
      expect.unreachable();
    } catch (err) {
      expect(err instanceof InvalidConfigError && Object.keys(err.issues)).toEqual(['(root)']);
    }
  });
});

describe('loadRenderingConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads the bundled defaults', () => {
    expect(loadRenderingConfig(DEFAULT_CONFIG_PATH)).toEqual({ format: 'pdf', theme: 'default', pageSize: 'letter' });
  });

  it('reads JSON and YAML files', () => {
    dir = mkdtempSync(join(tmpdir(), 'config-'));
    writeFileSync(join(dir, 'a.json'), JSON.stringify({ format: 'html', theme: 'minimal' }));
    writeFileSync(join(dir, 'b.yaml'), 'format: rendercv\npageSize: a4\n');

    expect(loadRenderingConfig(join(dir, 'a.json'))).toMatchObject({ format: 'html', theme: 'minimal' });
    expect(loadRenderingConfig(join(dir, 'b.yaml'))).toMatchObject({ format: 'rendercv', pageSize: 'a4' });
  });

  it('rejects other file types', () => {
    dir = mkdtempSync(join(tmpdir(), 'config-'));
    writeFileSync(join(dir, 'c.toml'), 'format = "pdf"');
    expect(() => loadRenderingConfig(join(dir ?? '', 'c.toml'))).toThrow('Unsupported config file type ".toml"');
  });
});
