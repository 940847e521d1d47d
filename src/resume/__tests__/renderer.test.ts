import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { renderResume } from '../renderer.js';
import { createDefaultRegistry } from '../registry.js';
import { writeOutputAtomic } from '../output.js';
import { DestinationWriteError, InvalidConfigError, UnknownFormatError } from '../errors.js';

const content = {
  basics: { name: 'Alice Example', email: 'alice@example.com' },
  skills: [{ name: 'Languages', keywords: ['TypeScript', 'SQL'] }],
};

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'render-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('renderResume', () => {
  const registry = createDefaultRegistry({ backends: [] });

  it('renders PDF by default', () => {
    const bytes = renderResume(content, {}, { registry });
    expect(bytes.subarray(0, 9).toString('latin1')).toBe('%PDF-1.4\n');
  });

  it('renders the requested format', () => {
    const bytes = renderResume(content, { format: 'html' }, { registry });
    expect(bytes.toString('utf-8')).toContain('<strong>Languages</strong>: TypeScript, SQL');
  });

  it('writes to the output path, creating parent directories', () => {
    const target = join(dir, 'out', 'nested', 'resume.html');
    const bytes = renderResume(content, { format: 'html', outputPath: target }, { registry });

    expect(readFileSync(target).equals(bytes)).toBe(true);
    expect(readdirSync(join(dir, 'out', 'nested'))).toEqual(['resume.html']);
  });

  it('lets the call option override the configured output path', () => {
    const configured = join(dir, 'configured.html');
    const override = join(dir, 'override.html');
    renderResume(content, { format: 'html', outputPath: configured }, { registry, outputPath: override });

    expect(readdirSync(dir)).toEqual(['override.html']);
  });

  it('rejects unknown formats before rendering', () => {
    expect(() => renderResume(content, { format: 'docx' }, { registry })).toThrow(UnknownFormatError);
  });

  it('rejects invalid configuration', () => {
    expect(() => renderResume(content, { format: '' }, { registry })).toThrow(InvalidConfigError);
  });

  it('uses the default registry when none is given', () => {
    const bytes = renderResume(content, { format: 'rendercv' });
    expect(bytes.toString('utf-8')).toContain('name: Alice Example');
  });
});

describe('writeOutputAtomic', () => {
  it('replaces an existing file', () => {
    const target = join(dir, 'resume.pdf');
    writeFileSync(target, 'old');
    writeOutputAtomic(target, Buffer.from('new'));

    expect(readFileSync(target, 'utf-8')).toBe('new');
    expect(readdirSync(dir)).toEqual(['resume.pdf']);
  });

  it('raises DestinationWriteError and leaves no temporary file behind', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'a file, not a directory');
    const target = join(blocker, 'resume.pdf');

    expect(() => writeOutputAtomic(target, Buffer.from('x'))).toThrow(DestinationWriteError);
    expect(() => writeOutputAtomic(target, Buffer.from('x'))).toThrow(`Could not write output to ${target}`);
    expect(readdirSync(dir)).toEqual(['blocker']);
  });

  it('cleans up the temporary file when the rename fails', () => {
    const target = join(dir, 'taken');
    // A non-empty directory cannot be replaced by a file
    writeOutputAtomic(join(target, 'child'), Buffer.from('child'));

    expect(() => writeOutputAtomic(target, Buffer.from('x'))).toThrow(DestinationWriteError);
    expect(readdirSync(dir)).toEqual(['taken']);
  });
});
