import type { ResumeContent } from '../content.js';
import type { RenderingConfig } from '../../config/rendering.js';

/** Converts resume content into the bytes of one output format. */
export interface Renderer {
  /** Registry key, e.g. `pdf` */
  readonly format: string;
  readonly mediaType: string;
  render(content: ResumeContent, config: RenderingConfig): Buffer;
}

/** Registered per format name; called once, on the first lookup. */
export type RendererFactory = () => Renderer;
