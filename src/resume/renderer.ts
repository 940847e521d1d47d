import { parseRenderingConfig, type RenderingConfigInput } from '../config/rendering.js';
import type { ResumeContent } from './content.js';
import { defaultRegistry, type RendererRegistry } from './registry.js';
import { writeOutputAtomic } from './output.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'resume:render' });

export interface RenderOptions {
  registry?: RendererRegistry;
  /** Overrides `config.outputPath` */
  outputPath?: string;
}

/**
 * Render a resume in the configured format. The bytes are always returned;
 * when an output path is set they are also written there.
 */
export function renderResume(
  content: ResumeContent,
  config: RenderingConfigInput = {},
  options: RenderOptions = {},
): Buffer {
  const resolved = parseRenderingConfig(config);
  const registry = options.registry ?? defaultRegistry;
  const renderer = registry.get(resolved.format);

  const start = Date.now();
  const bytes = renderer.render(content, resolved);
  log.info(
    { format: resolved.format, theme: resolved.theme, bytes: bytes.length, durationMs: Date.now() - start },
    'Resume rendered',
  );

  const outputPath = options.outputPath ?? resolved.outputPath;
  if (outputPath) writeOutputAtomic(outputPath, bytes);
  return bytes;
}
