import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadResumeDocument, parseResumeDocument } from '../content.js';

describe('parseResumeDocument', () => {
  it('keeps every top-level key', () => {
    expect(parseResumeDocument('{"basics":{"name":"Ann"},"hobbies":["chess"]}')).toEqual({
      basics: { name: 'Ann' },
      hobbies: ['chess'],
    });
  });

  it('rejects non-object content', () => {
    expect(() => parseResumeDocument('[1, 2]')).toThrow('Resume content in JSON input must be an object');
  });
});

describe('loadResumeDocument', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads YAML resumes', () => {
    dir = mkdtempSync(join(tmpdir(), 'resume-'));
    const path = join(dir, 'resume.yml');
    writeFileSync(path, 'basics:\n  name: Ann\nwork:\n  - company: Acme\n');
    expect(loadResumeDocument(path)).toEqual({ basics: { name: 'Ann' }, work: [{ company: 'Acme' }] });
  });

  it('reports a missing file', () => {
    expect(() => loadResumeDocument('/nonexistent/resume.json')).toThrow('Resume file not found at /nonexistent/resume.json');
  });
});
