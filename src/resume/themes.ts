import { readFileSync, readdirSync, existsSync } from 'node:fs';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { env } from '../config/env.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'resume:themes' });

export interface Theme {
  readonly name: string;
  /** Handlebars template text */
  readonly template: string;
  readonly css: string;
}

export const DEFAULT_THEME = 'default';
export const CUSTOM_THEME = 'custom';

const TEMPLATE_FILES = ['template.hbs', 'index.hbs', 'template.html'];
const STYLESHEET_FILES = ['styles.css', 'style.css'];

const __dirname = dirname(fileURLToPath(import.meta.url));
export const BUNDLED_THEMES_DIR = resolve(__dirname, '../../themes');

function readFirst(dir: string, candidates: string[]): string | undefined {
  for (const name of candidates) {
    const path = join(dir, name);
    if (existsSync(path)) return readFileSync(path, 'utf-8');
  }
  return undefined;
}

export class ThemeRegistry {
  private readonly themes = new Map<string, Theme>();
  private readonly defaultTheme: Theme;

  constructor(themes: Iterable<Theme>, defaultName: string = DEFAULT_THEME) {
    for (const theme of themes) {
      if (!this.themes.has(theme.name)) this.themes.set(theme.name, Object.freeze({ ...theme }));
    }
    const fallback = this.themes.get(defaultName);
    if (!fallback) {
      throw new Error(`Default theme "${defaultName}" is not among the loaded themes (${this.names().join(', ')})`);
    }
    this.defaultTheme = fallback;
  }

  /**
   * Load every `<dir>/<theme>/template.hbs` (plus `styles.css` when present).
   * A theme name found in an earlier directory wins over later ones.
   */
  static fromDirectories(dirs: string[], defaultName: string = DEFAULT_THEME): ThemeRegistry {
    const found: Theme[] = [];
    for (const dir of dirs) {
      if (!existsSync(dir)) {
        log.warn({ dir }, 'Theme directory does not exist, skipping');
        continue;
      }
      for (const entry of readdirSync(dir, { withFileTypes: true })) {
        if (!entry.isDirectory()) continue;
        const themeDir = join(dir, entry.name);
        const template = readFirst(themeDir, TEMPLATE_FILES);
        if (template === undefined) continue;
        found.push({ name: entry.name, template, css: readFirst(themeDir, STYLESHEET_FILES) ?? '' });
      }
    }
    const registry = new ThemeRegistry(found, defaultName);
    log.debug({ themes: registry.names() }, 'Themes loaded');
    return registry;
  }

  names(): string[] {
    return [...this.themes.keys()];
  }

  has(name: string): boolean {
    return this.themes.has(name);
  }

  get(name: string): Theme | undefined {
    return this.themes.get(name);
  }

  /**
   * A non-empty custom template is used verbatim and skips the lookup. An
   * unknown theme name is not an error: it logs a warning and yields the
   * default theme.
   */
  resolve(themeName: string, customTemplate?: string): Theme {
    if (customTemplate !== undefined && customTemplate !== '') {
      return { name: CUSTOM_THEME, template: customTemplate, css: '' };
    }

    const theme = this.themes.get(themeName);
    if (theme) return theme;

    log.warn(
      { theme: themeName, available: this.names() },
      `Unknown theme "${themeName}", using "${this.defaultTheme.name}". Available themes: ${this.names().join(', ')}`,
    );
    return this.defaultTheme;
  }
}

export const builtinThemes = ThemeRegistry.fromDirectories(
  env.RESUME_THEMES_DIR ? [BUNDLED_THEMES_DIR, env.RESUME_THEMES_DIR] : [BUNDLED_THEMES_DIR],
);
