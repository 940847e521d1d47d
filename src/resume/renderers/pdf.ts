import type { Renderer } from './base.js';
import type { ResumeContent } from '../content.js';
import type { RenderingConfig } from '../../config/rendering.js';
import { env } from '../../config/env.js';
import { buildContext } from '../context.js';
import { composeMarkup } from './html.js';
import { builtinThemes, type ThemeRegistry } from '../themes.js';
import { backendsFromEnv, tryNativeRender, type NativeBackend } from '../native-backend.js';
import { BackendFailureError } from '../errors.js';
import { flattenMarkup, contextFragments } from '../../pdf/fragments.js';
import { serializeDocument } from '../../pdf/serializer.js';
import { logger } from '../../observability/logger.js';

const log = logger.child({ module: 'resume:pdf' });

export interface PdfRendererOptions {
  themes?: ThemeRegistry;
  /** Tried in order; defaults to the RESUME_PDF_BACKEND setting */
  backends?: readonly NativeBackend[];
}

/**
 * HTML through a native converter when one is installed, otherwise the
 * built-in serializer. A converter that is present but fails is an error,
 * never a fallback.
 */
export class PdfRenderer implements Renderer {
  readonly format = 'pdf';
  readonly mediaType = 'application/pdf';
  private readonly themes: ThemeRegistry;
  private readonly backends: readonly NativeBackend[];

  constructor(options: PdfRendererOptions = {}) {
    this.themes = options.themes ?? builtinThemes;
    this.backends = options.backends ?? backendsFromEnv(env.RESUME_PDF_BACKEND);
  }

  render(content: ResumeContent, config: RenderingConfig): Buffer {
    const context = buildContext(content);
    const markup = composeMarkup(context, config, this.themes);

    const native = tryNativeRender(markup, this.backends);
    if (native.status === 'ok') {
      log.debug({ backend: native.backend, bytes: native.bytes.length }, 'PDF rendered by native backend');
      return native.bytes;
    }
    if (native.status === 'failed') {
      log.error({ err: native.error, backend: native.backend }, 'Native PDF backend failed');
      throw new BackendFailureError(native.backend, native.error);
    }

    log.debug({ reason: native.reason }, 'No native PDF backend available, using built-in serializer');
    const fragments = flattenMarkup(markup);
    return serializeDocument(fragments.length > 0 ? fragments : contextFragments(context), {
      pageSize: config.pageSize,
      title: context.basics.name,
      creationDate: config.timestamp,
    });
  }
}
