import Handlebars from 'handlebars';
import { TemplateError } from './errors.js';

const hb = Handlebars.create();

hb.registerHelper('join', (items: unknown, separator: unknown) => {
  if (!Array.isArray(items)) return '';
  const sep = typeof separator === 'string' ? separator : ', ';
  return items.filter((item) => item !== undefined && item !== null && item !== '').join(sep);
});

hb.registerHelper('upper', (text: unknown) => (typeof text === 'string' ? text.toUpperCase() : ''));

// Theme templates are immutable, so compiled delegates can live for the process.
// Caller-supplied templates share the cache, hence the cap.
const MAX_COMPILED = 64;
const compiled = new Map<string, Handlebars.TemplateDelegate>();

function compile(text: string): Handlebars.TemplateDelegate {
  const cached = compiled.get(text);
  if (cached) return cached;
  const delegate = hb.compile(text);
  if (compiled.size >= MAX_COMPILED) {
    const oldest = compiled.keys().next().value;
    if (oldest !== undefined) compiled.delete(oldest);
  }
  compiled.set(text, delegate);
  return delegate;
}

/**
 * Apply a Handlebars template to a context. Both compile and apply errors are
 * reported as TemplateError; Handlebars compiles lazily, so a syntax error
 * surfaces on the first call.
 */
export function renderTemplate(text: string, context: object, templateName = 'custom'): string {
  try {
    return compile(text)(context);
  } catch (err) {
    compiled.delete(text);
    throw new TemplateError(templateName, err);
  }
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
