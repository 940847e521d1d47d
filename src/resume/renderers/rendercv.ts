import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import yaml from 'js-yaml';
import type { Renderer } from './base.js';
import type { ResumeContent } from '../content.js';
import type { RenderingConfig } from '../../config/rendering.js';
import { buildContext, type PlainValue, type ResumeContext } from '../context.js';
import {
  commandFailure,
  findExecutable,
  isNotFound,
  isPdf,
  spawnRunner,
  type CommandRunner,
  type ExecutableLookup,
} from '../native-backend.js';
import { BackendFailureError, ToolchainUnavailableError } from '../errors.js';
import { logger } from '../../observability/logger.js';

const log = logger.child({ module: 'resume:rendercv' });

export const RENDERCV_THEMES = ['classic', 'sb2nov', 'moderncv', 'engineeringresumes', 'engineeringclassic'];

// Networks RenderCV knows how to link; others are left out of social_networks
const RENDERCV_NETWORKS = new Map(
  ['LinkedIn', 'GitHub', 'GitLab', 'Instagram', 'ORCID', 'Mastodon', 'StackOverflow', 'ResearchGate', 'YouTube', 'Google Scholar', 'Telegram', 'X'].map(
    (name) => [name.toLowerCase(), name] as const,
  ),
);

type YamlMap = Record<string, unknown>;

function defined(entry: YamlMap): YamlMap {
  return Object.fromEntries(Object.entries(entry).filter(([, value]) => value !== undefined));
}

/** RenderCV accepts YYYY, YYYY-MM, YYYY-MM-DD or "present". */
export function toRenderCvDate(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (/^(present|current|now|ongoing)$/i.test(trimmed)) return 'present';
  const match = /^(\d{4})(-\d{2})?(-\d{2})?(T.*)?$/.exec(trimmed);
  if (!match) return undefined;
  return `${match[1]}${match[2] ?? ''}${match[3] ?? ''}`;
}

/** start_date/end_date when both parse, otherwise the period as free text. */
function dates(start: string | undefined, end: string | undefined, period: string | undefined): YamlMap {
  const startDate = toRenderCvDate(start);
  const endDate = toRenderCvDate(end);
  const startOk = start === undefined || startDate !== undefined;
  const endOk = end === undefined || endDate !== undefined;
  if (startOk && endOk && startDate !== undefined) return defined({ start_date: startDate, end_date: endDate });
  if (startOk && endOk && endDate !== undefined) return { date: endDate };
  return period !== undefined ? { date: period } : {};
}

function plainText(value: PlainValue): string {
  if (Array.isArray(value)) return value.map(plainText).join(', ');
  if (typeof value === 'object') {
    return Object.entries(value)
      .map(([key, child]) => `${key}: ${plainText(child)}`)
      .join('; ');
  }
  return String(value);
}

function extraEntries(value: PlainValue): unknown[] {
  if (Array.isArray(value)) return value.map(plainText);
  if (typeof value === 'object') {
    return Object.entries(value).map(([label, child]) => ({ label, details: plainText(child) }));
  }
  return [String(value)];
}

/** `side_projects` and `sideProjects` share a title; later ones get their key appended. */
function uniqueTitle(sections: YamlMap, title: string, key: string): string {
  if (!Object.hasOwn(sections, title)) return title;
  const keyed = `${title} (${key})`;
  let candidate = keyed;
  for (let n = 2; Object.hasOwn(sections, candidate); n++) candidate = `${keyed} ${n}`;
  return candidate;
}

/** Map a context onto RenderCV's input document (`cv` + `design`). */
export function toRenderCv(context: ResumeContext, theme: string): YamlMap {
  const { basics } = context;
  const sections: YamlMap = {};

  if (basics.summary) sections.summary = [basics.summary];

  if (context.work) {
    sections.experience = context.work.map((job) =>
      defined({
        company: job.name ?? job.position ?? 'Experience',
        position: job.position ?? '',
        location: job.location,
        ...dates(job.startDate, job.endDate, job.period),
        summary: job.summary,
        highlights: job.highlights,
      }),
    );
  }

  if (context.education) {
    sections.education = context.education.map((edu) => {
      const highlights = [
        edu.score ? `Score: ${edu.score}` : undefined,
        edu.courses ? `Courses: ${edu.courses.join(', ')}` : undefined,
      ].filter((line): line is string => line !== undefined);
      return defined({
        institution: edu.institution ?? edu.area ?? 'Education',
        area: edu.area ?? '',
        degree: edu.studyType,
        ...dates(edu.startDate, edu.endDate, edu.period),
        highlights: highlights.length > 0 ? highlights : undefined,
      });
    });
  }

  if (context.projects) {
    sections.projects = context.projects.map((project) =>
      defined({
        name: project.name ?? 'Project',
        ...dates(project.startDate, project.endDate, project.period),
        summary: project.description,
        highlights: project.highlights,
      }),
    );
  }

  if (context.skills) {
    sections.skills = context.skills.map((skill) => ({
      label: skill.name ?? 'Skills',
      details: [skill.level, skill.keywords?.join(', ')].filter(Boolean).join(' - ') || (skill.name ?? ''),
    }));
  }

  for (const extra of context.extraSections) {
    sections[uniqueTitle(sections, extra.title, extra.key)] = extraEntries(extra.value);
  }

  const socialNetworks = (basics.profiles ?? []).flatMap((profile) => {
    const network = profile.network ? RENDERCV_NETWORKS.get(profile.network.toLowerCase()) : undefined;
    return network && profile.username ? [{ network, username: profile.username }] : [];
  });

  const cv = defined({
    name: basics.name,
    label: basics.label,
    location: basics.location,
    email: basics.email,
    phone: basics.phone,
    website: basics.url,
    social_networks: socialNetworks.length > 0 ? socialNetworks : undefined,
    sections: Object.keys(sections).length > 0 ? sections : undefined,
  });

  return {
    cv,
    design: { theme: RENDERCV_THEMES.includes(theme) ? theme : 'classic' },
  };
}

export function toRenderCvYaml(content: ResumeContent, theme: string): string {
  return yaml.dump(toRenderCv(buildContext(content), theme), { noRefs: true, lineWidth: -1, sortKeys: false });
}

/** Emits the YAML document the RenderCV toolchain takes as input. */
export class RenderCvRenderer implements Renderer {
  readonly format = 'rendercv';
  readonly mediaType = 'application/yaml';

  render(content: ResumeContent, config: RenderingConfig): Buffer {
    return Buffer.from(toRenderCvYaml(content, config.theme), 'utf-8');
  }
}

export const RENDERCV_COMMAND = 'rendercv';
const INSTALL_HINT = 'Install the RenderCV toolchain with: pip install "rendercv[full]"';

export interface RenderCvPdfRendererOptions {
  findExecutable?: ExecutableLookup;
  run?: CommandRunner;
}

/**
 * Runs `rendercv render` on the generated YAML in a scratch directory and
 * returns the PDF it writes. The scratch directory is removed on every path.
 */
export class RenderCvPdfRenderer implements Renderer {
  readonly format = 'rendercv-pdf';
  readonly mediaType = 'application/pdf';
  private readonly lookup: ExecutableLookup;
  private readonly run: CommandRunner;

  constructor(options: RenderCvPdfRendererOptions = {}) {
    this.lookup = options.findExecutable ?? ((command) => findExecutable(command));
    this.run = options.run ?? spawnRunner;
  }

  render(content: ResumeContent, config: RenderingConfig): Buffer {
    const executable = this.lookup(RENDERCV_COMMAND);
    if (!executable) throw new ToolchainUnavailableError(RENDERCV_COMMAND, INSTALL_HINT);

    const workDir = mkdtempSync(join(tmpdir(), 'rendercv-'));
    try {
      const yamlPath = join(workDir, 'resume.yaml');
      const pdfPath = join(workDir, 'resume.pdf');
      writeFileSync(yamlPath, toRenderCvYaml(content, config.theme), 'utf-8');

      const result = this.run(executable, ['render', yamlPath, '--pdf-path', pdfPath], '', { cwd: workDir });
      if (result.error && isNotFound(result.error)) {
        throw new ToolchainUnavailableError(RENDERCV_COMMAND, INSTALL_HINT);
      }
      const failure = commandFailure(RENDERCV_COMMAND, result);
      if (failure) throw new BackendFailureError(RENDERCV_COMMAND, failure);

      const bytes = existsSync(pdfPath) ? readFileSync(pdfPath) : Buffer.alloc(0);
      if (!isPdf(bytes)) {
        throw new BackendFailureError(RENDERCV_COMMAND, new Error(`${RENDERCV_COMMAND} did not produce a PDF`));
      }
      log.debug({ bytes: bytes.length }, 'PDF rendered by RenderCV');
      return bytes;
    } finally {
      rmSync(workDir, { recursive: true, force: true });
    }
  }
}
