import { escapeHtml } from './template.js';
import type { ResumeContent } from './content.js';

/** A JSON value with every absent or empty leaf removed. */
export type PlainValue = string | number | boolean | PlainValue[] | PlainRecord;
export interface PlainRecord {
  [key: string]: PlainValue;
}

export const NAMED_SECTIONS = ['work', 'education', 'projects', 'skills'] as const;
export type SectionName = (typeof NAMED_SECTIONS)[number];

// Keys that are neither rendered nor carried as extra sections
const METADATA_KEYS = new Set(['meta', '$schema']);
const CORE_KEYS = new Set<string>(['basics', ...NAMED_SECTIONS]);

export interface ProfileEntry {
  network?: string;
  username?: string;
  url?: string;
}

export interface BasicsContext {
  name?: string;
  label?: string;
  email?: string;
  phone?: string;
  url?: string;
  summary?: string;
  location?: string;
  profiles?: ProfileEntry[];
  /** email, phone, url and location in display order */
  contact?: string[];
}

export interface WorkEntry {
  name?: string;
  position?: string;
  location?: string;
  url?: string;
  startDate?: string;
  endDate?: string;
  period?: string;
  summary?: string;
  highlights?: string[];
}

export interface EducationEntry {
  institution?: string;
  area?: string;
  studyType?: string;
  url?: string;
  startDate?: string;
  endDate?: string;
  period?: string;
  score?: string;
  courses?: string[];
}

export interface ProjectEntry {
  name?: string;
  description?: string;
  url?: string;
  startDate?: string;
  endDate?: string;
  period?: string;
  highlights?: string[];
  keywords?: string[];
}

export interface SkillEntry {
  name?: string;
  level?: string;
  keywords?: string[];
}

export interface ExtraSection {
  key: string;
  title: string;
  value: PlainValue;
  /** Minimal HTML fragment for the value, already escaped */
  html: string;
}

export interface ResumeContext {
  basics: BasicsContext;
  work?: WorkEntry[];
  education?: EducationEntry[];
  projects?: ProjectEntry[];
  skills?: SkillEntry[];
  extraSections: ExtraSection[];
  /** Named sections that had no entries left after pruning */
  emptySections: SectionName[];
}

// ── Emptiness predicates, one per leaf type ──────────────────────────────

const isEmptyString = (value: string): boolean => value.trim() === '';
const isEmptyNumber = (value: number): boolean => !Number.isFinite(value);
const isEmptyDate = (value: Date): boolean => Number.isNaN(value.getTime());

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/** YAML loaders turn bare dates into Date objects; keep them looking like dates. */
function dateText(value: Date): string {
  const iso = value.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}

function prune(value: unknown, seen: WeakSet<object>): PlainValue | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return isEmptyString(value) ? undefined : value.trim();
  if (typeof value === 'number') return isEmptyNumber(value) ? undefined : value;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return isEmptyDate(value) ? undefined : dateText(value);

  if (Array.isArray(value)) {
    if (seen.has(value)) return undefined;
    seen.add(value);
    const items = value.map((item) => prune(item, seen)).filter(isDefined);
    seen.delete(value);
    return items.length > 0 ? items : undefined;
  }

  if (isPlainObject(value)) {
    if (seen.has(value)) return undefined;
    seen.add(value);
    const out: PlainRecord = {};
    for (const [key, child] of Object.entries(value)) {
      const pruned = prune(child, seen);
      // defineProperty so a parsed "__proto__" key stays an own key
      if (pruned !== undefined) {
        Object.defineProperty(out, key, { value: pruned, enumerable: true, writable: true, configurable: true });
      }
    }
    seen.delete(value);
    return Object.keys(out).length > 0 ? out : undefined;
  }

  // functions, symbols, class instances: nothing a template can show
  return undefined;
}

/**
 * Recursively drop absent values: null/undefined, blank strings, non-finite
 * numbers, and arrays/objects that are empty once their children are pruned.
 * Total: returns undefined rather than throwing, including for cyclic input.
 */
export function pruneValue(value: unknown): PlainValue | undefined {
  return prune(value, new WeakSet());
}

export function isEmptyValue(value: unknown): boolean {
  return pruneValue(value) === undefined;
}

// ── Typed projections ────────────────────────────────────────────────────

function isRecord(value: PlainValue | undefined): value is PlainRecord {
  return typeof value === 'object' && !Array.isArray(value);
}

function scalarText(value: PlainValue | undefined): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function text(record: PlainRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const found = scalarText(record[key]);
    if (found !== undefined) return found;
  }
  return undefined;
}

function textList(record: PlainRecord, key: string): string[] | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  const items = (Array.isArray(value) ? value : [value]).map(scalarText).filter(isDefined);
  return items.length > 0 ? items : undefined;
}

/** Remove undefined fields; an entry with nothing left is itself absent. */
function compact<T extends object>(entry: T): T | undefined {
  let kept = 0;
  for (const [key, value] of Object.entries(entry)) {
    if (value === undefined) Reflect.deleteProperty(entry, key);
    else kept += 1;
  }
  return kept > 0 ? entry : undefined;
}

function period(start: string | undefined, end: string | undefined): string | undefined {
  if (start && end) return `${start} – ${end}`;
  if (start) return `${start} – Present`;
  return end;
}

function formatLocation(value: PlainValue | undefined): string | undefined {
  if (isRecord(value)) {
    const parts = ['address', 'city', 'region', 'postalCode', 'countryCode']
      .map((key) => scalarText(value[key]))
      .filter(isDefined);
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  return scalarText(value);
}

function toProfile(value: PlainValue): ProfileEntry | undefined {
  if (!isRecord(value)) return undefined;
  return compact({
    network: text(value, 'network'),
    username: text(value, 'username'),
    url: text(value, 'url'),
  });
}

function buildBasics(value: PlainValue | undefined): BasicsContext {
  if (!isRecord(value)) return {};

  const profilesValue = value.profiles;
  const profiles = Array.isArray(profilesValue) ? profilesValue.map(toProfile).filter(isDefined) : [];

  const basics: BasicsContext = {
    name: text(value, 'name'),
    label: text(value, 'label', 'headline'),
    email: text(value, 'email'),
    phone: text(value, 'phone'),
    url: text(value, 'url', 'website'),
    summary: text(value, 'summary'),
    location: formatLocation(value.location),
    profiles: profiles.length > 0 ? profiles : undefined,
  };
  const contact = [basics.email, basics.phone, basics.url, basics.location].filter(isDefined);
  basics.contact = contact.length > 0 ? contact : undefined;

  return compact(basics) ?? {};
}

function toWork(value: PlainValue): WorkEntry | undefined {
  if (!isRecord(value)) return undefined;
  const startDate = text(value, 'startDate');
  const endDate = text(value, 'endDate');
  return compact({
    name: text(value, 'name', 'company'),
    position: text(value, 'position'),
    location: text(value, 'location'),
    url: text(value, 'url'),
    startDate,
    endDate,
    period: period(startDate, endDate),
    summary: text(value, 'summary', 'description'),
    highlights: textList(value, 'highlights') ?? textList(value, 'bullets'),
  });
}

function toEducation(value: PlainValue): EducationEntry | undefined {
  if (!isRecord(value)) return undefined;
  const startDate = text(value, 'startDate');
  const endDate = text(value, 'endDate', 'date');
  return compact({
    institution: text(value, 'institution'),
    area: text(value, 'area'),
    studyType: text(value, 'studyType'),
    url: text(value, 'url'),
    startDate,
    endDate,
    period: period(startDate, endDate),
    score: text(value, 'score'),
    courses: textList(value, 'courses'),
  });
}

function toProject(value: PlainValue): ProjectEntry | undefined {
  if (!isRecord(value)) return undefined;
  const startDate = text(value, 'startDate');
  const endDate = text(value, 'endDate');
  return compact({
    name: text(value, 'name'),
    description: text(value, 'description', 'summary'),
    url: text(value, 'url'),
    startDate,
    endDate,
    period: period(startDate, endDate),
    highlights: textList(value, 'highlights'),
    keywords: textList(value, 'keywords'),
  });
}

function toSkill(value: PlainValue): SkillEntry | undefined {
  const plain = scalarText(value);
  if (plain !== undefined) return { name: plain };
  if (!isRecord(value)) return undefined;
  return compact({
    name: text(value, 'name'),
    level: text(value, 'level'),
    keywords: textList(value, 'keywords'),
  });
}

function entries<T>(value: PlainValue | undefined, project: (item: PlainValue) => T | undefined): T[] {
  if (value === undefined) return [];
  // A lone object where a list belongs is read as a one-entry list
  const items = Array.isArray(value) ? value : [value];
  return items.map(project).filter(isDefined);
}

// ── Extra sections ───────────────────────────────────────────────────────

export function sectionTitle(key: string): string {
  const title = key
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
  return title || key;
}

function inlineHtml(value: PlainValue): string {
  const scalar = scalarText(value);
  return scalar !== undefined ? escapeHtml(scalar) : fragmentHtml(value);
}

export function fragmentHtml(value: PlainValue): string {
  if (Array.isArray(value)) {
    return `<ul>${value.map((item) => `<li>${inlineHtml(item)}</li>`).join('')}</ul>`;
  }
  if (isRecord(value)) {
    const pairs = Object.entries(value).map(
      ([key, child]) => `<dt>${escapeHtml(key)}</dt><dd>${inlineHtml(child)}</dd>`,
    );
    return `<dl>${pairs.join('')}</dl>`;
  }
  return `<p>${escapeHtml(String(value))}</p>`;
}

/**
 * Turn resume content into the view a theme template renders. Never throws:
 * malformed optional data is omitted. Named sections with no entries left
 * are reported in `emptySections` and left out of the context.
 */
export function buildContext(document: ResumeContent): ResumeContext {
  const pruned = pruneValue(document);
  const root: PlainRecord = isRecord(pruned) ? pruned : {};

  const context: ResumeContext = {
    basics: buildBasics(root.basics),
    extraSections: [],
    emptySections: [],
  };

  const work = entries(root.work, toWork);
  const education = entries(root.education, toEducation);
  const projects = entries(root.projects, toProject);
  const skills = entries(root.skills, toSkill);

  if (work.length > 0) context.work = work;
  else context.emptySections.push('work');
  if (education.length > 0) context.education = education;
  else context.emptySections.push('education');
  if (projects.length > 0) context.projects = projects;
  else context.emptySections.push('projects');
  if (skills.length > 0) context.skills = skills;
  else context.emptySections.push('skills');

  // Object.entries keeps insertion order for string keys; pruning preserved it
  for (const [key, value] of Object.entries(root)) {
    if (CORE_KEYS.has(key) || METADATA_KEYS.has(key)) continue;
    context.extraSections.push({ key, title: sectionTitle(key), value, html: fragmentHtml(value) });
  }

  return context;
}
