import type { PageSizeName } from '../config/rendering.js';

export type TextStyleName = 'title' | 'heading' | 'subheading' | 'body' | 'bullet';

export interface TextFragment {
  text: string;
  style: TextStyleName;
}

export interface TextStyle {
  /** Font size in points */
  size: number;
  /** Vertical advance of one line */
  leading: number;
  /** Extra gap before the first line of a fragment, dropped at the top of a page */
  spaceBefore: number;
  /** Left indent of every line of the fragment */
  indent: number;
}

export interface PageProfile {
  name: PageSizeName;
  width: number;
  height: number;
  margin: number;
  /** CSS `@page` size keyword, for native backends */
  cssSize: string;
}

/*
 * Layout constants of the default theme. Text is set in Helvetica and its
 * width estimated from an average character width, so no font metrics are
 * needed. All units are PostScript points (1/72 in).
 */
export const AVERAGE_CHAR_WIDTH = 0.5; // em

export const TEXT_STYLES: Readonly<Record<TextStyleName, TextStyle>> = {
  title: { size: 18, leading: 24, spaceBefore: 0, indent: 0 },
  heading: { size: 13, leading: 18, spaceBefore: 8, indent: 0 },
  subheading: { size: 11, leading: 15, spaceBefore: 4, indent: 0 },
  body: { size: 10, leading: 14, spaceBefore: 0, indent: 0 },
  bullet: { size: 10, leading: 14, spaceBefore: 0, indent: 12 },
};

export const BULLET_MARKER = '•';

export const PAGE_PROFILES: Readonly<Record<PageSizeName, PageProfile>> = {
  letter: { name: 'letter', width: 612, height: 792, margin: 54, cssSize: 'letter' },
  a4: { name: 'a4', width: 595, height: 842, margin: 54, cssSize: 'A4' },
};

export function usableWidth(profile: PageProfile): number {
  return profile.width - 2 * profile.margin;
}

export function usableHeight(profile: PageProfile): number {
  return profile.height - 2 * profile.margin;
}

export function estimateWidth(text: string, style: TextStyle): number {
  // Count code points so a surrogate pair is one character
  return [...text].length * style.size * AVERAGE_CHAR_WIDTH;
}

/**
 * Greedy word wrap. Words are never split; a word wider than `maxWidth`
 * gets a line of its own. Only ASCII whitespace breaks; a no-break space
 * (U+00A0) is part of the word. Whitespace-only text yields no lines.
 */
export function wrapText(text: string, style: TextStyle, maxWidth: number): string[] {
  const words = text.split(/[ \t\n\r\f]+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (!current || estimateWidth(candidate, style) <= maxWidth) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export interface LayoutLine {
  text: string;
  style: TextStyleName;
  /** Offset from the left margin */
  x: number;
  /** Gap requested before this line (non-zero only on a fragment's first line) */
  spaceBefore: number;
  /** Bullet marker drawn at the left margin, first line of a bullet only */
  marker?: string;
}

export function layoutFragments(fragments: readonly TextFragment[], profile: PageProfile): LayoutLine[] {
  const lines: LayoutLine[] = [];
  const width = usableWidth(profile);

  for (const fragment of fragments) {
    const style = TEXT_STYLES[fragment.style];
    const wrapped = wrapText(fragment.text, style, width - style.indent);
    wrapped.forEach((text, index) => {
      const line: LayoutLine = {
        text,
        style: fragment.style,
        x: style.indent,
        spaceBefore: index === 0 ? style.spaceBefore : 0,
      };
      if (fragment.style === 'bullet' && index === 0) line.marker = BULLET_MARKER;
      lines.push(line);
    });
  }
  return lines;
}

export interface PlacedLine {
  text: string;
  style: TextStyleName;
  size: number;
  /** Absolute page coordinates of the baseline start */
  x: number;
  y: number;
  marker?: string;
}

export interface PageLayout {
  lines: PlacedLine[];
}

/**
 * Fill pages top to bottom. A page is sealed when the next line would run
 * past the bottom margin; a line always lands on an empty page, so every
 * line is placed. The result has at least one (possibly empty) page.
 */
export function paginate(lines: readonly LayoutLine[], profile: PageProfile): PageLayout[] {
  const pages: PageLayout[] = [];
  const limit = usableHeight(profile);
  const top = profile.height - profile.margin;
  let page: PageLayout = { lines: [] };
  let used = 0;

  for (const line of lines) {
    const style = TEXT_STYLES[line.style];
    let gap = page.lines.length > 0 ? line.spaceBefore : 0;

    if (page.lines.length > 0 && used + gap + style.leading > limit) {
      pages.push(page);
      page = { lines: [] };
      used = 0;
      gap = 0;
    }

    const placed: PlacedLine = {
      text: line.text,
      style: line.style,
      size: style.size,
      x: profile.margin + line.x,
      y: top - used - gap - style.size,
    };
    if (line.marker) placed.marker = line.marker;
    page.lines.push(placed);
    used += gap + style.leading;
  }

  pages.push(page);
  return pages;
}
