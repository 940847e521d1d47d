import type { PageSizeName } from '../config/rendering.js';
import { pdfString, formatNumber, formatPdfDate } from './encoding.js';
import { flattenMarkup } from './fragments.js';
import {
  PAGE_PROFILES,
  layoutFragments,
  paginate,
  type PageLayout,
  type PageProfile,
  type TextFragment,
} from './layout.js';

export const PDF_HEADER = Buffer.from('%PDF-1.4\n%\xe2\xe3\xcf\xd3\n', 'latin1');
export const PDF_EOF = '%%EOF';
export const PRODUCER = 'resume-render';

const FONT_RESOURCE = 'F1';

export type PdfObject =
  | { id: number; kind: 'catalog'; pages: number }
  | { id: number; kind: 'pages'; kids: number[] }
  | { id: number; kind: 'font'; baseFont: string }
  | { id: number; kind: 'page'; parent: number; font: number; contents: number; mediaBox: [number, number] }
  | { id: number; kind: 'content'; stream: Buffer }
  | { id: number; kind: 'info'; title?: string; producer: string; creationDate?: Date };

export interface ObjectGraph {
  /** Ordered by id, ids 1..n without gaps */
  objects: PdfObject[];
  root: number;
  info?: number;
}

export interface DocumentInfo {
  title?: string;
  /** The one non-deterministic input; omit it for byte-identical output */
  creationDate?: Date;
}

function contentStream(page: PageLayout, profile: PageProfile): Buffer {
  const chunks: Buffer[] = [];
  const write = (text: string) => chunks.push(Buffer.from(text, 'latin1'));
  if (page.lines.length === 0) return Buffer.alloc(0);

  write('BT\n');
  let currentSize = -1;
  for (const line of page.lines) {
    if (line.size !== currentSize) {
      write(`/${FONT_RESOURCE} ${formatNumber(line.size)} Tf\n`);
      currentSize = line.size;
    }
    const y = formatNumber(line.y);
    if (line.marker) {
      write(`1 0 0 1 ${formatNumber(profile.margin + 2)} ${y} Tm\n`);
      chunks.push(pdfString(line.marker));
      write(' Tj\n');
    }
    write(`1 0 0 1 ${formatNumber(line.x)} ${y} Tm\n`);
    chunks.push(pdfString(line.text));
    write(' Tj\n');
  }
  write('ET');
  return Buffer.concat(chunks);
}

/**
 * Assign ids in a fixed order: catalog, pages, font, then a page and its
 * content stream for each page in order, then the optional info dictionary.
 */
export function buildObjectGraph(pages: readonly PageLayout[], profile: PageProfile, info: DocumentInfo = {}): ObjectGraph {
  const catalogId = 1;
  const pagesId = 2;
  const fontId = 3;
  const kids: number[] = [];
  const objects: PdfObject[] = [
    { id: catalogId, kind: 'catalog', pages: pagesId },
    { id: pagesId, kind: 'pages', kids },
    { id: fontId, kind: 'font', baseFont: 'Helvetica' },
  ];

  let nextId = fontId + 1;
  for (const page of pages) {
    const pageId = nextId;
    const contentId = nextId + 1;
    nextId += 2;
    kids.push(pageId);
    objects.push({
      id: pageId,
      kind: 'page',
      parent: pagesId,
      font: fontId,
      contents: contentId,
      mediaBox: [profile.width, profile.height],
    });
    objects.push({ id: contentId, kind: 'content', stream: contentStream(page, profile) });
  }

  const graph: ObjectGraph = { objects, root: catalogId };
  if (info.title !== undefined || info.creationDate !== undefined) {
    const infoId = nextId;
    objects.push({ id: infoId, kind: 'info', title: info.title, producer: PRODUCER, creationDate: info.creationDate });
    graph.info = infoId;
  }
  return graph;
}

const ref = (id: number) => `${id} 0 R`;

function objectBody(object: PdfObject): Buffer {
  switch (object.kind) {
    case 'catalog':
      return Buffer.from(`<< /Type /Catalog /Pages ${ref(object.pages)} >>`, 'latin1');
    case 'pages':
      return Buffer.from(
        `<< /Type /Pages /Kids [${object.kids.map(ref).join(' ')}] /Count ${object.kids.length} >>`,
        'latin1',
      );
    case 'font':
      return Buffer.from(
        `<< /Type /Font /Subtype /Type1 /BaseFont /${object.baseFont} /Encoding /WinAnsiEncoding >>`,
        'latin1',
      );
    case 'page': {
      const [width, height] = object.mediaBox;
      return Buffer.from(
        `<< /Type /Page /Parent ${ref(object.parent)} /MediaBox [0 0 ${formatNumber(width)} ${formatNumber(height)}]` +
          ` /Resources << /Font << /${FONT_RESOURCE} ${ref(object.font)} >> >> /Contents ${ref(object.contents)} >>`,
        'latin1',
      );
    }
    case 'content':
      return Buffer.concat([
        Buffer.from(`<< /Length ${object.stream.length} >>\nstream\n`, 'latin1'),
        object.stream,
        Buffer.from('\nendstream', 'latin1'),
      ]);
    case 'info': {
      const parts: Buffer[] = [Buffer.from('<<', 'latin1')];
      if (object.title !== undefined) parts.push(Buffer.from(' /Title ', 'latin1'), pdfString(object.title));
      parts.push(Buffer.from(' /Producer ', 'latin1'), pdfString(object.producer));
      if (object.creationDate !== undefined) {
        parts.push(Buffer.from(' /CreationDate ', 'latin1'), pdfString(formatPdfDate(object.creationDate)));
      }
      parts.push(Buffer.from(' >>', 'latin1'));
      return Buffer.concat(parts);
    }
  }
}

/**
 * Write header, objects, cross-reference table and trailer. Offsets are
 * taken from the same buffer list that is concatenated into the result.
 */
export function emitDocument(graph: ObjectGraph): Buffer {
  const chunks: Buffer[] = [PDF_HEADER];
  let offset = PDF_HEADER.length;
  const offsets: number[] = [];

  const push = (chunk: Buffer) => {
    chunks.push(chunk);
    offset += chunk.length;
  };

  for (const object of graph.objects) {
    offsets.push(offset);
    push(Buffer.from(`${object.id} 0 obj\n`, 'latin1'));
    push(objectBody(object));
    push(Buffer.from('\nendobj\n', 'latin1'));
  }

  const xrefStart = offset;
  const size = graph.objects.length + 1;
  // Each entry is exactly 20 bytes: 10-digit offset, 5-digit generation, type, EOL
  const entries = ['0000000000 65535 f \n', ...offsets.map((o) => `${String(o).padStart(10, '0')} 00000 n \n`)];
  push(Buffer.from(`xref\n0 ${size}\n${entries.join('')}`, 'latin1'));

  const infoEntry = graph.info !== undefined ? ` /Info ${ref(graph.info)}` : '';
  push(
    Buffer.from(
      `trailer\n<< /Size ${size} /Root ${ref(graph.root)}${infoEntry} >>\nstartxref\n${xrefStart}\n${PDF_EOF}`,
      'latin1',
    ),
  );

  return Buffer.concat(chunks);
}

export interface SerializeOptions extends DocumentInfo {
  pageSize?: PageSizeName;
}

/**
 * Lay out markup (or ready-made fragments) and emit a complete PDF. There is
 * no error path: empty input gives a single blank page, an over-long word
 * overflows its line, and long content simply makes more pages.
 */
export function serializeDocument(input: string | readonly TextFragment[], options: SerializeOptions = {}): Buffer {
  const profile = PAGE_PROFILES[options.pageSize ?? 'letter'];
  const fragments = typeof input === 'string' ? flattenMarkup(input) : input;
  const pages = paginate(layoutFragments(fragments, profile), profile);
  const graph = buildObjectGraph(pages, profile, { title: options.title, creationDate: options.creationDate });
  return emitDocument(graph);
}
