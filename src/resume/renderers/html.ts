import type { Renderer } from './base.js';
import type { ResumeContent } from '../content.js';
import type { RenderingConfig } from '../../config/rendering.js';
import { buildContext, type ResumeContext } from '../context.js';
import { renderTemplate } from '../template.js';
import { builtinThemes, type ThemeRegistry } from '../themes.js';
import { PAGE_PROFILES } from '../../pdf/layout.js';

/**
 * Resolve the theme and apply it to a context. `customCss` replaces the
 * theme's stylesheet; the `@page` rule follows the configured page size so
 * that native PDF backends print on the same paper as the serializer.
 */
export function composeMarkup(context: ResumeContext, config: RenderingConfig, themes: ThemeRegistry): string {
  const theme = themes.resolve(config.theme, config.customTemplate);
  const profile = PAGE_PROFILES[config.pageSize];
  const css = [
    config.customCss ?? theme.css,
    `@page { size: ${profile.cssSize}; margin: ${profile.margin}pt; }`,
  ].join('\n');

  return renderTemplate(theme.template, { ...context, css, pageSize: config.pageSize }, theme.name);
}

export class HtmlRenderer implements Renderer {
  readonly format = 'html';
  readonly mediaType = 'text/html; charset=utf-8';

  constructor(private readonly themes: ThemeRegistry = builtinThemes) {}

  render(content: ResumeContent, config: RenderingConfig): Buffer {
    const context = buildContext(content);
    return Buffer.from(composeMarkup(context, config, this.themes), 'utf-8');
  }
}
