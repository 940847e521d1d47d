import { describe, it, expect, vi } from 'vitest';
import { PdfRenderer } from '../renderers/pdf.js';
import { ThemeRegistry } from '../themes.js';
import { BackendFailureError } from '../errors.js';
import { parseRenderingConfig } from '../../config/rendering.js';
import type { NativeBackend } from '../native-backend.js';
import type { ResumeDocument } from '../content.js';

const alice: ResumeDocument = {
  basics: { name: 'Alice Example', label: 'Engineer' },
  work: [{ name: 'Acme', position: 'Developer', highlights: ['Shipped X'] }],
};

const pdfConfig = (extra: Record<string, unknown> = {}) => parseRenderingConfig({ format: 'pdf', ...extra });

describe('PdfRenderer', () => {
  it('falls back to the built-in serializer when no backend is present', () => {
    const absent: NativeBackend = { name: 'absent', convert: () => ({ status: 'unavailable', reason: 'not installed' }) };
    const bytes = new PdfRenderer({ backends: [absent] }).render(alice, pdfConfig());
    const text = bytes.toString('latin1');

    expect(text.startsWith('%PDF-1.4\n')).toBe(true);
    expect(text.endsWith('%%EOF')).toBe(true);
    expect(text).toContain('(Alice Example) Tj');
    expect(text).toContain('(Shipped X) Tj');
    expect(text).toContain('/Title (Alice Example)');
  });

  it('returns the native bytes when a backend succeeds', () => {
    const convert = vi.fn(() => ({ status: 'ok' as const, backend: 'stub', bytes: Buffer.from('%PDF-native') }));
    const bytes = new PdfRenderer({ backends: [{ name: 'stub', convert }] }).render(alice, pdfConfig());

    expect(bytes.toString('latin1')).toBe('%PDF-native');
    expect(convert).toHaveBeenCalledWith(expect.stringContaining('<h1>Alice Example</h1>'));
  });

  it('raises a backend failure instead of falling back', () => {
    const failing: NativeBackend = {
      name: 'stub',
      convert: () => ({ status: 'failed', backend: 'stub', error: new Error('kaboom') }),
    };
    const renderer = new PdfRenderer({ backends: [failing] });

    expect(() => renderer.render(alice, pdfConfig())).toThrow(BackendFailureError);
    expect(() => renderer.render(alice, pdfConfig())).toThrow('PDF backend "stub" failed: kaboom');
  });

  it('produces identical bytes for identical input', () => {
    const renderer = new PdfRenderer({ backends: [] });
    expect(renderer.render(alice, pdfConfig()).equals(renderer.render(alice, pdfConfig()))).toBe(true);
  });

  it('records the configured timestamp as the creation date', () => {
    const bytes = new PdfRenderer({ backends: [] }).render(alice, pdfConfig({ timestamp: '2024-01-02T03:04:05Z' }));
    expect(bytes.toString('latin1')).toContain('/CreationDate (D:20240102030405Z)');
  });

  it('uses the A4 media box when asked', () => {
    const bytes = new PdfRenderer({ backends: [] }).render(alice, pdfConfig({ pageSize: 'a4' }));
    expect(bytes.toString('latin1')).toContain('/MediaBox [0 0 595 842]');
  });

  it('builds text from the context when the theme markup has none', () => {
    const themes = new ThemeRegistry([{ name: 'default', template: '<div class="empty"></div>', css: '' }]);
    const text = new PdfRenderer({ themes, backends: [] }).render(alice, pdfConfig()).toString('latin1');

    expect(text).toContain('(Alice Example) Tj');
    expect(text).toContain('(Experience) Tj');
    expect(text).toContain('(Developer, Acme) Tj');
  });
});
