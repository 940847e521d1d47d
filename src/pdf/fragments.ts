import type { ResumeContext, PlainValue } from '../resume/context.js';
import type { TextFragment, TextStyleName } from './layout.js';

// Elements whose content is never page text
const SKIPPED_TAGS = new Set(['head', 'style', 'script', 'title', 'template', 'noscript', 'svg']);
const VOID_TAGS = new Set(['br', 'hr', 'img', 'meta', 'link', 'input', 'col', 'wbr', 'source']);
const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'body', 'dd', 'div', 'dl', 'dt', 'figure', 'footer',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'br', 'li', 'main', 'nav', 'ol', 'p', 'pre',
  'section', 'table', 'tbody', 'td', 'th', 'thead', 'tr', 'ul',
]);

const TAG_STYLES: Readonly<Record<string, TextStyleName>> = {
  h1: 'title',
  h2: 'heading',
  h3: 'subheading',
  h4: 'subheading',
  h5: 'subheading',
  h6: 'subheading',
  dt: 'subheading',
  li: 'bullet',
};

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
  ndash: '–',
  mdash: '—',
  bull: '•',
  middot: '·',
  hellip: '…',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  copy: '©',
  reg: '®',
  trade: '™',
  euro: '€',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (match, body: string) => {
    if (body.startsWith('#')) {
      const codePoint = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return codePoint > 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[body] ?? match;
  });
}

const TOKEN = /<!--[\s\S]*?(?:-->|$)|<![^>]*>|<\/?([a-zA-Z][a-zA-Z0-9-]*)\b[^>]*>|[^<]+|</g;

/**
 * Reduce HTML to an ordered list of styled text runs. Block-level tags end
 * the current run; the innermost styled ancestor (h1-h6, dt, li) picks the
 * style. Not a validating parser: unknown or unbalanced tags are tolerated.
 */
export function flattenMarkup(html: string): TextFragment[] {
  const fragments: TextFragment[] = [];
  const styles: TextStyleName[] = [];
  let skipDepth = 0;
  let buffer = '';

  const flush = () => {
    // Collapse ASCII whitespace only; U+00A0 keeps words together
    const text = decodeEntities(buffer).replace(/[ \t\n\r\f]+/g, ' ').replace(/^ | $/g, '');
    buffer = '';
    if (text) fragments.push({ text, style: styles[styles.length - 1] ?? 'body' });
  };

  for (const match of html.matchAll(TOKEN)) {
    const token = match[0];
    const tagName = match[1]?.toLowerCase();

    if (tagName === undefined) {
      // Comments and doctypes start with "<!"; everything else is text
      if (skipDepth === 0 && !token.startsWith('<!')) buffer += token;
      continue;
    }

    const closing = token.startsWith('</');
    const selfClosing = token.endsWith('/>') || VOID_TAGS.has(tagName);

    if (SKIPPED_TAGS.has(tagName)) {
      if (selfClosing) continue;
      if (closing) skipDepth = Math.max(0, skipDepth - 1);
      else skipDepth += 1;
      continue;
    }
    if (skipDepth > 0) continue;

    if (BLOCK_TAGS.has(tagName)) flush();

    const style = TAG_STYLES[tagName];
    if (style && !selfClosing) {
      if (closing) {
        const index = styles.lastIndexOf(style);
        if (index !== -1) styles.splice(index, 1);
      } else {
        styles.push(style);
      }
    }
  }

  flush();
  return fragments;
}

function valueFragments(value: PlainValue, out: TextFragment[], prefix = ''): void {
  if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item === 'object') valueFragments(item, out, prefix);
      else out.push({ text: `${prefix}${String(item)}`, style: 'bullet' });
    }
    return;
  }
  if (typeof value === 'object') {
    for (const [key, child] of Object.entries(value)) {
      if (typeof child === 'object') {
        out.push({ text: `${prefix}${key}`, style: 'body' });
        valueFragments(child, out, `${prefix}${key}: `);
      } else {
        out.push({ text: `${prefix}${key}: ${String(child)}`, style: 'body' });
      }
    }
    return;
  }
  out.push({ text: `${prefix}${String(value)}`, style: 'body' });
}

function joined(...parts: Array<string | undefined>): string {
  return parts.filter(Boolean).join(', ');
}

/** Fragments straight from a context, for when there is no usable markup. */
export function contextFragments(context: ResumeContext): TextFragment[] {
  const out: TextFragment[] = [];
  const { basics } = context;

  if (basics.name) out.push({ text: basics.name, style: 'title' });
  if (basics.label) out.push({ text: basics.label, style: 'body' });
  if (basics.contact) out.push({ text: basics.contact.join(' | '), style: 'body' });
  if (basics.summary) {
    out.push({ text: 'Summary', style: 'heading' });
    out.push({ text: basics.summary, style: 'body' });
  }

  if (context.work) {
    out.push({ text: 'Experience', style: 'heading' });
    for (const job of context.work) {
      out.push({ text: joined(job.position, job.name) || 'Position', style: 'subheading' });
      if (job.period) out.push({ text: job.period, style: 'body' });
      if (job.summary) out.push({ text: job.summary, style: 'body' });
      for (const highlight of job.highlights ?? []) out.push({ text: highlight, style: 'bullet' });
    }
  }

  if (context.education) {
    out.push({ text: 'Education', style: 'heading' });
    for (const edu of context.education) {
      out.push({ text: joined(edu.studyType, edu.area) || edu.institution || 'Education', style: 'subheading' });
      const detail = joined(edu.institution, edu.period);
      if (detail) out.push({ text: detail, style: 'body' });
    }
  }

  if (context.projects) {
    out.push({ text: 'Projects', style: 'heading' });
    for (const project of context.projects) {
      out.push({ text: project.name ?? 'Project', style: 'subheading' });
      if (project.description) out.push({ text: project.description, style: 'body' });
      for (const highlight of project.highlights ?? []) out.push({ text: highlight, style: 'bullet' });
    }
  }

  if (context.skills) {
    out.push({ text: 'Skills', style: 'heading' });
    for (const skill of context.skills) {
      const keywords = skill.keywords?.join(', ');
      const text = skill.name && keywords ? `${skill.name}: ${keywords}` : skill.name ?? keywords;
      if (text) out.push({ text, style: 'bullet' });
    }
  }

  for (const section of context.extraSections) {
    out.push({ text: section.title, style: 'heading' });
    valueFragments(section.value, out);
  }

  return out;
}
