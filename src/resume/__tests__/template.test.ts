import { describe, it, expect } from 'vitest';
import { renderTemplate, escapeHtml } from '../template.js';
import { TemplateError } from '../errors.js';

describe('renderTemplate', () => {
  it('escapes interpolated values', () => {
    expect(renderTemplate('Hello {{name}}', { name: '<A>' })).toBe('Hello &lt;A&gt;');
  });

  it('joins lists and skips blank items', () => {
    expect(renderTemplate('{{join items " | "}}', { items: ['a', '', 'b'] })).toBe('a | b');
  });

  it('falls back to a comma separator', () => {
    expect(renderTemplate('{{join items}}', { items: ['a', 'b'] })).toBe('a, b');
  });

  it('upper-cases text', () => {
    expect(renderTemplate('{{upper name}}', { name: 'ada' })).toBe('ADA');
  });

  it('reports syntax errors as TemplateError naming the template', () => {
    expect(() => renderTemplate('{{#if x}}', {}, 'broken')).toThrow(TemplateError);
    expect(() => renderTemplate('{{#if x}}', {}, 'broken')).toThrow(/Template "broken" could not be rendered/);
  });
});

describe('escapeHtml', () => {
  it('escapes the five reserved characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
  });
});
