export { renderResume, type RenderOptions } from './resume/renderer.js';
export {
  RendererRegistry,
  createDefaultRegistry,
  defaultRegistry,
  registerRenderer,
  type DefaultRegistryOptions,
} from './resume/registry.js';
export type { Renderer, RendererFactory } from './resume/renderers/base.js';
export { HtmlRenderer, composeMarkup } from './resume/renderers/html.js';
export { PdfRenderer, type PdfRendererOptions } from './resume/renderers/pdf.js';
export {
  RenderCvRenderer,
  RenderCvPdfRenderer,
  toRenderCv,
  toRenderCvYaml,
  type RenderCvPdfRendererOptions,
} from './resume/renderers/rendercv.js';
export { ThemeRegistry, builtinThemes, DEFAULT_THEME, CUSTOM_THEME, type Theme } from './resume/themes.js';
export { buildContext, sectionTitle, type ResumeContext, type ExtraSection } from './resume/context.js';
export {
  loadResumeDocument,
  parseResumeDocument,
  type ResumeContent,
  type ResumeDocument,
} from './resume/content.js';
export {
  CommandBackend,
  weasyprintBackend,
  wkhtmltopdfBackend,
  tryNativeRender,
  type NativeBackend,
  type NativeBackendResult,
} from './resume/native-backend.js';
export { writeOutputAtomic } from './resume/output.js';
export {
  RenderError,
  UnknownFormatError,
  BackendFailureError,
  DestinationWriteError,
  TemplateError,
  ToolchainUnavailableError,
  InvalidConfigError,
  type RenderErrorCode,
} from './resume/errors.js';
export {
  parseRenderingConfig,
  loadRenderingConfig,
  getDefaultRenderingConfig,
  type RenderingConfig,
  type RenderingConfigInput,
  type PageSizeName,
} from './config/rendering.js';
export { serializeDocument, type SerializeOptions } from './pdf/serializer.js';
