import { readFileSync, existsSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'resume:content' });

export interface LocationInput {
  address?: string | null;
  postalCode?: string | null;
  city?: string | null;
  countryCode?: string | null;
  region?: string | null;
}

export interface ProfileInput {
  network?: string | null;
  username?: string | null;
  url?: string | null;
}

export interface BasicsInput {
  name?: string | null;
  label?: string | null;
  email?: string | null;
  phone?: string | null;
  url?: string | null;
  summary?: string | null;
  location?: LocationInput | string | null;
  profiles?: Array<ProfileInput | null> | null;
}

export interface WorkInput {
  name?: string | null;
  company?: string | null;
  position?: string | null;
  location?: string | null;
  url?: string | null;
  startDate?: string | null;
  endDate?: string | null;
  summary?: string | null;
  highlights?: Array<string | null> | null;
}

export interface EducationInput {
  institution?: string | null;
  area?: string | null;
  studyType?: string | null;
  url?: string | null;
  startDate?: string | null;
  endDate?: string | null;
  score?: string | null;
  courses?: Array<string | null> | null;
}

export interface ProjectInput {
  name?: string | null;
  description?: string | null;
  url?: string | null;
  startDate?: string | null;
  endDate?: string | null;
  highlights?: Array<string | null> | null;
  keywords?: Array<string | null> | null;
}

export interface SkillInput {
  name?: string | null;
  level?: string | null;
  keywords?: Array<string | null> | null;
}

/**
 * JSON Resume shaped input. Schema conformance is checked upstream; any
 * top-level key outside the named sections is carried as an extra section.
 */
export interface ResumeDocument {
  basics?: BasicsInput | null;
  work?: Array<WorkInput | null> | null;
  education?: Array<EducationInput | null> | null;
  projects?: Array<ProjectInput | null> | null;
  skills?: Array<SkillInput | string | null> | null;
  [section: string]: unknown;
}

/** What the renderers accept: a typed document, or any parsed JSON/YAML object. */
export type ResumeContent = ResumeDocument | Readonly<Record<string, unknown>>;

const resumeDocumentSchema = z
  .object({
    basics: z.record(z.unknown()).nullish(),
  })
  .passthrough();

function checkDocument(parsed: unknown, source: string): Record<string, unknown> {
  const result = resumeDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Resume content in ${source} must be an object with an optional "basics" object`);
  }
  return result.data;
}

export function parseResumeDocument(text: string): Record<string, unknown> {
  return checkDocument(JSON.parse(text), 'JSON input');
}

/** Read a resume from a .json, .yaml or .yml file. */
export function loadResumeDocument(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new Error(`Resume file not found at ${path}`);
  }

  const raw = readFileSync(path, 'utf-8');
  const ext = extname(path).toLowerCase();

  let parsed: unknown;
  if (ext === '.json') {
    parsed = JSON.parse(raw);
  } else if (ext === '.yaml' || ext === '.yml') {
    parsed = yaml.load(raw);
  } else {
    throw new Error(`Unsupported resume file type "${ext || path}". Use .json, .yaml or .yml`);
  }

  const document = checkDocument(parsed, path);
  log.debug({ path, sections: Object.keys(document).length }, 'Resume document loaded');
  return document;
}
