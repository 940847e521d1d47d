import { readFileSync } from 'node:fs';
import { resolve, dirname, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { InvalidConfigError } from '../resume/errors.js';
import { logger } from '../observability/logger.js';

export const PAGE_SIZES = ['letter', 'a4'] as const;
export type PageSizeName = (typeof PAGE_SIZES)[number];

const renderingConfigSchema = z.object({
  format: z.string().min(1).default('pdf'),
  theme: z.string().min(1).default('default'),
  // Literal template text; takes precedence over `theme` when non-empty
  customTemplate: z.string().optional(),
  customCss: z.string().optional(),
  outputPath: z.string().min(1).optional(),
  pageSize: z.enum(PAGE_SIZES).default('letter'),
  // Written as the PDF creation date; leave unset for reproducible output
  timestamp: z.coerce.date().optional(),
});

export type RenderingConfig = z.infer<typeof renderingConfigSchema>;
export type RenderingConfigInput = z.input<typeof renderingConfigSchema>;

const __dirname = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CONFIG_PATH = resolve(__dirname, '../../config/rendering.yml');

function toIssues(error: z.ZodError): Record<string, string[]> {
  const { formErrors, fieldErrors } = error.flatten();
  const issues: Record<string, string[]> = {};
  for (const [field, messages] of Object.entries(fieldErrors)) {
    if (messages && messages.length > 0) issues[field] = messages;
  }
  if (formErrors.length > 0) issues['(root)'] = formErrors;
  return issues;
}

export function parseRenderingConfig(input: unknown = {}): RenderingConfig {
  const result = renderingConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidConfigError(toIssues(result.error));
  }
  return result.data;
}

export function getDefaultRenderingConfig(): RenderingConfig {
  return renderingConfigSchema.parse({});
}

/** Load a rendering config from a .json, .yaml or .yml file. */
export function loadRenderingConfig(path: string = DEFAULT_CONFIG_PATH): RenderingConfig {
  const log = logger.child({ module: 'config:rendering' });
  const raw = readFileSync(path, 'utf-8');
  const ext = extname(path).toLowerCase();

  let parsed: unknown;
  if (ext === '.json') {
    parsed = JSON.parse(raw);
  } else if (ext === '.yaml' || ext === '.yml') {
    parsed = yaml.load(raw);
  } else {
    throw new Error(`Unsupported config file type "${ext || path}". Use .json, .yaml or .yml`);
  }

  const config = parseRenderingConfig(parsed);
  log.debug({ path, format: config.format, theme: config.theme }, 'Rendering config loaded');
  return config;
}
