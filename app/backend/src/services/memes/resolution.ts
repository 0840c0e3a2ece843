import { z } from 'zod';

import { PipelineConfig } from '../../config';
import { logger } from '../../logger';
import { arg, isSchemeLike, QueryParams } from '../http/urls';
import { Template, TemplateRepository } from '../templates/types';
import { SlugCodec } from '../text/slugCodec';
import { TrackingSink } from '../tracking/trackingQueue';

export const CUSTOM_TEMPLATE_ID = 'custom';

const BACKGROUND_KEYS = ['background', 'alt'];
const CUSTOM_STYLE_KEYS = ['style'];
const NAMED_STYLE_KEYS = ['style', 'alt'];

const UNPROCESSABLE = 422;

const statusSchema = z.coerce.number().int().min(100).max(599);
const dimensionSchema = z.string().trim().regex(/^\d+$/).transform(Number);

export interface RenderRequest {
  readonly templateId: string;
  readonly slug: string;
  readonly watermark: string;
  readonly extension: string;
  readonly query: QueryParams;
  /** Full request URL, attached to tracking events. */
  readonly url: string;
}

export interface Size {
  width: number;
  height: number;
}

export interface ResolvedJob {
  template: Template;
  style: string;
  lines: string[];
  watermark: string;
  extension: string;
  size: Size;
  status: number;
}

export interface ResolutionContext {
  config: PipelineConfig;
  templates: TemplateRepository;
  codec: Pick<SlugCodec, 'decode'>;
  tracking: TrackingSink;
}

interface BranchResult {
  template: Template;
  style: string;
  status: number;
}

export const isPlaceholder = (config: PipelineConfig, value: string | undefined): boolean =>
  value === config.placeholder;

const errorTemplate = async ({ config, templates }: ResolutionContext): Promise<Template> => {
  const template = await templates.get(config.errorTemplateId);
  if (!template) {
    throw new Error(`Error template "${config.errorTemplateId}" is missing`);
  }
  return template;
};

const parseStatus = (query: QueryParams): number => {
  const requested = arg(query, '200', 'status');
  const parsed = statusSchema.safeParse(requested);
  if (!parsed.success) {
    logger.warn(`[Resolve] Ignoring invalid status override: ${requested}`);
    return 200;
  }
  return parsed.data;
};

const isOversize = (slug: string, config: PipelineConfig) =>
  slug.split('/').some((part) => Buffer.byteLength(part, 'utf-8') > config.maxSegmentBytes);

const truncate = (slug: string, length: number) => `${Array.from(slug).slice(0, length).join('')}...`;

/**
 * Unsupported styles fall back to the error template. A scheme-like style
 * (a raw image URL that could not be used) is a 415; anything else is a 422
 * unless it is the placeholder.
 */
const checkStyle = async (
  branch: BranchResult,
  context: ResolutionContext
): Promise<BranchResult> => {
  const { config, templates } = context;
  if (await templates.supportsStyle(branch.template, branch.style)) {
    return branch;
  }
  logger.error(`[Resolve] Invalid style for ${branch.template.id}: ${branch.style}`);
  let { status } = branch;
  if (isSchemeLike(branch.style)) {
    status = 415;
  } else if (!isPlaceholder(config, branch.style)) {
    status = UNPROCESSABLE;
  }
  return { template: await errorTemplate(context), style: config.defaultStyle, status };
};

const resolveCustom = async (
  query: QueryParams,
  status: number,
  context: ResolutionContext
): Promise<BranchResult> => {
  const { config, templates } = context;
  const url = arg(query, undefined, ...BACKGROUND_KEYS);
  if (!url) {
    logger.error('[Resolve] No image URL specified for custom template');
    return { template: await errorTemplate(context), style: config.defaultStyle, status: UNPROCESSABLE };
  }

  let template = await templates.createFromUrl(url);
  if (!(await templates.hasImage(template))) {
    logger.error(`[Resolve] Unable to download image URL: ${url}`);
    template = await errorTemplate(context);
    if (!isPlaceholder(config, url)) {
      status = 415;
    }
  }

  let style = arg(query, config.defaultStyle, ...CUSTOM_STYLE_KEYS);
  if (!isSchemeLike(style)) {
    style = style.toLowerCase();
  }
  return checkStyle({ template, style, status }, context);
};

const resolveNamed = async (
  id: string,
  query: QueryParams,
  status: number,
  context: ResolutionContext
): Promise<BranchResult> => {
  const { config, templates } = context;
  let template = await templates.get(id);
  if (!template || !(await templates.hasImage(template))) {
    logger.error(`[Resolve] No such template: ${id}`);
    template = await errorTemplate(context);
    if (!isPlaceholder(config, id)) {
      status = 404;
    }
  }

  const style = arg(query, config.defaultStyle, ...NAMED_STYLE_KEYS);
  return checkStyle({ template, style, status }, context);
};

const parseSize = (query: QueryParams): Size | undefined => {
  const width = dimensionSchema.safeParse(query.width ?? '0');
  const height = dimensionSchema.safeParse(query.height ?? '0');
  if (!width.success || !height.success) {
    logger.error(`[Resolve] Invalid size: ${query.width ?? ''}x${query.height ?? ''}`);
    return undefined;
  }
  const tooSmall = (value: number) => value > 0 && value < 10;
  if (tooSmall(width.data) || tooSmall(height.data)) {
    logger.error(`[Resolve] Dimensions are too small: ${width.data}x${height.data}`);
    return undefined;
  }
  return { width: width.data, height: height.data };
};

/**
 * Resolves a render request into a job. Template and style failures swap in
 * the error template; size and extension failures only adjust the job.
 * Branch order: oversize text, custom background, named template.
 */
export const resolveRenderJob = async (
  request: RenderRequest,
  context: ResolutionContext
): Promise<ResolvedJob> => {
  const { config, codec } = context;
  let lines = codec.decode(request.slug);
  context.tracking.enqueue({ lines, url: request.url });

  let branch: BranchResult;
  const status = parseStatus(request.query);
  if (isOversize(request.slug, config)) {
    logger.error(`[Resolve] Slug too long: ${request.slug}`);
    lines = codec.decode(truncate(request.slug, config.truncatedSlugLength));
    branch = { template: await errorTemplate(context), style: config.defaultStyle, status: 414 };
  } else if (request.templateId === CUSTOM_TEMPLATE_ID) {
    branch = await resolveCustom(request.query, status, context);
  } else {
    branch = await resolveNamed(request.templateId, request.query, status, context);
  }

  let { status: resolvedStatus } = branch;

  let size = parseSize(request.query);
  if (!size) {
    size = { width: 0, height: 0 };
    resolvedStatus = UNPROCESSABLE;
  }

  let { extension } = request;
  if (!config.allowedExtensions.includes(extension)) {
    logger.error(`[Resolve] Unsupported extension: ${extension}`);
    extension = config.defaultExtension;
    resolvedStatus = UNPROCESSABLE;
  }

  return {
    template: branch.template,
    style: branch.style,
    lines,
    watermark: request.watermark,
    extension,
    size,
    status: resolvedStatus,
  };
};
