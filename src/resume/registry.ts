import type { Renderer, RendererFactory } from './renderers/base.js';
import { HtmlRenderer } from './renderers/html.js';
import { PdfRenderer } from './renderers/pdf.js';
import { RenderCvRenderer, RenderCvPdfRenderer, type RenderCvPdfRendererOptions } from './renderers/rendercv.js';
import type { ThemeRegistry } from './themes.js';
import type { NativeBackend } from './native-backend.js';
import { UnknownFormatError } from './errors.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'resume:registry' });

/**
 * Format name → renderer. Factories run on the first `get()` for their
 * format and the instance is reused afterwards.
 */
export class RendererRegistry {
  private readonly factories = new Map<string, RendererFactory>();
  private readonly instances = new Map<string, Renderer>();

  register(format: string, factory: RendererFactory): this {
    if (this.factories.has(format)) {
      log.debug({ format }, 'Replacing renderer registration');
    }
    this.factories.set(format, factory);
    // Callers holding the old instance keep it; new lookups get the new factory's
    this.instances.delete(format);
    return this;
  }

  get(format: string): Renderer {
    const cached = this.instances.get(format);
    if (cached) return cached;

    const factory = this.factories.get(format);
    if (!factory) {
      throw new UnknownFormatError(format, this.list());
    }
    const renderer = factory();
    this.instances.set(format, renderer);
    return renderer;
  }

  has(format: string): boolean {
    return this.factories.has(format);
  }

  list(): string[] {
    return [...this.factories.keys()];
  }
}

export interface DefaultRegistryOptions {
  themes?: ThemeRegistry;
  backends?: readonly NativeBackend[];
  rendercv?: RenderCvPdfRendererOptions;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): RendererRegistry {
  return new RendererRegistry()
    .register('html', () => new HtmlRenderer(options.themes))
    .register('pdf', () => new PdfRenderer({ themes: options.themes, backends: options.backends }))
    .register('rendercv', () => new RenderCvRenderer())
    .register('rendercv-pdf', () => new RenderCvPdfRenderer(options.rendercv));
}

export const defaultRegistry = createDefaultRegistry();

export function registerRenderer(
  format: string,
  factory: RendererFactory,
  registry: RendererRegistry = defaultRegistry,
): RendererRegistry {
  return registry.register(format, factory);
}
