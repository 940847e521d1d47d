import { describe, it, expect } from 'vitest';
import {
  PAGE_PROFILES,
  TEXT_STYLES,
  estimateWidth,
  layoutFragments,
  paginate,
  usableHeight,
  usableWidth,
  wrapText,
  type TextFragment,
} from '../layout.js';

const letter = PAGE_PROFILES.letter;
const body = TEXT_STYLES.body;

describe('page geometry', () => {
  it('subtracts the margins', () => {
    expect(usableWidth(letter)).toBe(504);
    expect(usableHeight(letter)).toBe(684);
  });
});

describe('estimateWidth', () => {
  it('counts code points at half an em each', () => {
    expect(estimateWidth('ab', body)).toBe(10);
    expect(estimateWidth('𝄞', body)).toBe(5);
  });
});

describe('wrapText', () => {
  it('fills lines greedily', () => {
    expect(wrapText('aaaa bbbb cccc', body, 45)).toEqual(['aaaa bbbb', 'cccc']);
  });

  it('gives an over-long word its own line', () => {
    expect(wrapText('short extraordinarily', body, 30)).toEqual(['short', 'extraordinarily']);
  });

  it('does not break at a no-break space', () => {
    expect(wrapText('aaaa\u00a0bbbb cccc', body, 30)).toEqual(['aaaa\u00a0bbbb', 'cccc']);
  });

  it('yields nothing for whitespace', () => {
    expect(wrapText(' \n\t ', body, 100)).toEqual([]);
  });
});

describe('layoutFragments', () => {
  it('indents bullets and marks only their first line', () => {
    const words = Array.from({ length: 20 }, () => 'word').join(' ');
    const lines = layoutFragments([{ text: words, style: 'bullet' }], letter);

    expect(lines.length).toBe(2);
    expect(lines[0]).toMatchObject({ x: 12, marker: '•' });
    expect(lines[1]?.marker).toBeUndefined();
  });
});

describe('paginate', () => {
  it('places the first baseline one font size below the top margin', () => {
    const pages = paginate(layoutFragments([{ text: 'Heading', style: 'heading' }], letter), letter);
    expect(pages[0]?.lines[0]).toMatchObject({ x: 54, y: 725, size: 13 });
  });

  it('applies space before a heading below other text', () => {
    const fragments: TextFragment[] = [
      { text: 'Intro', style: 'body' },
      { text: 'Heading', style: 'heading' },
    ];
    const [page] = paginate(layoutFragments(fragments, letter), letter);
    expect(page?.lines.map((line) => line.y)).toEqual([728, 703]);
  });

  it('always returns at least one page', () => {
    expect(paginate([], letter)).toEqual([{ lines: [] }]);
  });

  it('starts new pages and keeps baselines descending within the margins', () => {
    const fragments = Array.from({ length: 200 }, (_, i): TextFragment => ({ text: `Line ${i}`, style: 'body' }));
    const pages = paginate(layoutFragments(fragments, letter), letter);

    expect(pages.map((page) => page.lines.length)).toEqual([48, 48, 48, 48, 8]);
    for (const page of pages) {
      const ys = page.lines.map((line) => line.y);
      expect(ys[0]).toBe(728);
      for (let i = 1; i < ys.length; i++) {
        expect(ys[i]).toBeLessThan(ys[i - 1] ?? Infinity);
      }
      expect(Math.min(...ys)).toBeGreaterThanOrEqual(letter.margin);
    }
  });

  it('never loses pages as text grows', () => {
    let previous = 0;
    for (let words = 0; words <= 2400; words += 150) {
      const text = Array.from({ length: words }, (_, i) => `w${i}`).join(' ');
      const count = paginate(layoutFragments([{ text, style: 'body' }], letter), letter).length;
      expect(count).toBeGreaterThanOrEqual(previous);
      previous = count;
    }
    expect(previous).toBeGreaterThan(1);
  });
});
