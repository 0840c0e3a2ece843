import { Attribution } from '../attribution/attributionService';
import { buildUrl, clean, encodePath, omit, QueryParams } from '../http/urls';
import { SlugCodec } from '../text/slugCodec';

export interface Redirect {
  kind: 'redirect';
  status: 301 | 302;
  location: string;
}

export interface Proceed {
  kind: 'proceed';
  slug: string;
  watermark: string;
}

export type GateDecision = Redirect | Proceed;

export interface ImageTarget {
  templateId: string;
  /** Present for text routes; template backgrounds have no slug. */
  slug?: string;
  extension: string;
}

export interface TextGateInput {
  templateId: string;
  slug: string;
  extension: string;
  query: QueryParams;
  url: string;
}

export interface TextGateDeps {
  codec: Pick<SlugCodec, 'normalize'>;
  attribution: Attribution;
}

export const imagePath = (basePath: string, target: ImageTarget): string => {
  const id = encodeURIComponent(target.templateId);
  return target.slug === undefined
    ? `${basePath}/${id}.${target.extension}`
    : `${basePath}/${id}/${encodePath(target.slug)}.${target.extension}`;
};

const redirect = (status: Redirect['status'], location: string): Redirect => ({
  kind: 'redirect',
  status,
  location,
});

/** `style=animated` belongs on a `.gif`: move it into the extension. */
export const checkAnimatedStyle = (
  basePath: string,
  target: ImageTarget,
  query: QueryParams
): Redirect | undefined => {
  if (query.style !== 'animated' || target.extension === 'gif') {
    return undefined;
  }
  const location = buildUrl(imagePath(basePath, { ...target, extension: 'gif' }), omit(query, 'style'));
  return redirect(301, clean(location));
};

/**
 * Runs the text route's canonicalization checks in order and stops at the
 * first redirect: animated style, slug normalization, tokenization, then
 * watermark override.
 */
export const canonicalizeText = async (
  basePath: string,
  input: TextGateInput,
  deps: TextGateDeps
): Promise<GateDecision> => {
  const { templateId, extension, query } = input;

  const animated = checkAnimatedStyle(basePath, { templateId, slug: input.slug, extension }, query);
  if (animated) {
    return animated;
  }

  const { slug, updated: normalized } = deps.codec.normalize(input.slug);
  if (normalized) {
    return redirect(301, clean(buildUrl(imagePath(basePath, { templateId, slug, extension }), query)));
  }

  const tokenized = await deps.attribution.tokenize(input.url);
  if (tokenized.updated) {
    return redirect(302, tokenized.url);
  }

  const { watermark, updated: consumed } = await deps.attribution.resolveWatermark(query);
  if (consumed) {
    const location = buildUrl(imagePath(basePath, { templateId, slug, extension }), omit(query, 'watermark'));
    return redirect(302, clean(location));
  }

  return { kind: 'proceed', slug, watermark };
};
