import { PipelineConfig } from '../../config';
import { Attribution } from '../attribution/attributionService';
import { buildUrl, QueryParams } from '../http/urls';
import { Renderer } from '../render/memeRenderer';
import { TemplateRepository } from '../templates/types';
import { SlugCodec } from '../text/slugCodec';
import { TrackingSink } from '../tracking/trackingQueue';
import { canonicalizeText, checkAnimatedStyle, imagePath, Redirect } from './canonicalization';
import { CUSTOM_TEMPLATE_ID, RenderRequest, resolveRenderJob } from './resolution';

export interface ImageFile {
  kind: 'file';
  status: number;
  path: string;
  extension: string;
}

export type ImageResponse = Redirect | ImageFile;

export interface TemplateImageRequest {
  templateId: string;
  extension: string;
  query: QueryParams;
  url: string;
}

export interface TextImageRequest extends TemplateImageRequest {
  textPath: string;
}

export interface MemeUrlRequest {
  templateId: string;
  lines: string[];
  style?: string;
  extension?: string;
}

export interface CustomMemeUrlRequest {
  background?: string;
  lines: string[];
  style?: string;
  extension?: string;
}

export interface ExampleImage {
  url: string;
  template: string;
}

interface MemeServiceOptions {
  basePath: string;
  config: PipelineConfig;
  templates: TemplateRepository;
  renderer: Renderer;
  attribution: Attribution;
  tracking: TrackingSink;
  codec: SlugCodec;
}

export class MemeService {
  constructor(private readonly options: MemeServiceOptions) {}

  /** Template background without text; only the animated-style check applies. */
  async displayTemplate(request: TemplateImageRequest): Promise<ImageResponse> {
    const { templateId, extension, query } = request;
    const redirect = checkAnimatedStyle(this.options.basePath, { templateId, extension }, query);
    if (redirect) {
      return redirect;
    }
    return this.render({ templateId, slug: '', watermark: '', extension, query, url: request.url });
  }

  async displayMeme(request: TextImageRequest): Promise<ImageResponse> {
    const { templateId, extension, query, url } = request;
    const decision = await canonicalizeText(
      this.options.basePath,
      { templateId, slug: request.textPath, extension, query, url },
      { codec: this.options.codec, attribution: this.options.attribution }
    );
    if (decision.kind === 'redirect') {
      return decision;
    }
    return this.render({ templateId, slug: decision.slug, watermark: decision.watermark, extension, query, url });
  }

  /** Resolves `undefined` when the template does not exist. */
  async createUrl(origin: string, request: MemeUrlRequest): Promise<string | undefined> {
    const template = await this.options.templates.get(request.templateId);
    if (!template || template.id.startsWith('_')) {
      return undefined;
    }
    return this.memeUrl(origin, template.id, request.lines, request.extension, {
      style: request.style ?? '',
    });
  }

  createCustomUrl(origin: string, request: CustomMemeUrlRequest): string {
    return this.memeUrl(origin, CUSTOM_TEMPLATE_ID, request.lines, request.extension, {
      background: request.background ?? '',
      style: request.style ?? '',
    });
  }

  async listExamples(origin: string, filter = ''): Promise<ExampleImage[]> {
    const needle = filter.toLowerCase();
    const templates = await this.options.templates.list();
    return templates
      .filter((template) => !template.id.startsWith('_') && template.example.length > 0)
      .filter((template) =>
        [template.id, template.name, ...template.example].some((value) => value.toLowerCase().includes(needle))
      )
      .map((template) => ({
        url: this.memeUrl(origin, template.id, template.example),
        template: template.id,
      }));
  }

  private memeUrl(
    origin: string,
    templateId: string,
    lines: readonly string[],
    extension = this.options.config.defaultExtension,
    query: QueryParams = {}
  ) {
    const slug = this.options.codec.encode(lines);
    return origin + buildUrl(imagePath(this.options.basePath, { templateId, slug, extension }), query);
  }

  private async render(request: RenderRequest): Promise<ImageFile> {
    const { config, templates, codec, tracking, renderer } = this.options;
    const job = await resolveRenderJob(request, { config, templates, codec, tracking });
    const path = await renderer.render(job);
    return { kind: 'file', status: job.status, path, extension: job.extension };
  }
}
