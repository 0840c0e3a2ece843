import { createHmac } from 'crypto';

import { QueryParams } from '../http/urls';

export interface RewrittenUrl {
  url: string;
  updated: boolean;
}

export interface ResolvedWatermark {
  watermark: string;
  updated: boolean;
}

export interface Attribution {
  tokenize(url: string): Promise<RewrittenUrl>;
  resolveWatermark(query: QueryParams): Promise<ResolvedWatermark>;
}

interface AttributionServiceOptions {
  secret?: string;
  defaultWatermark: string;
  allowedWatermarks: string[];
}

export class AttributionService implements Attribution {
  constructor(private readonly options: AttributionServiceOptions) {}

  /**
   * Swaps an `api_key` query parameter for a signed `token` bound to the
   * path. URLs without a key, or a service without a secret, are left alone.
   */
  async tokenize(url: string): Promise<RewrittenUrl> {
    const parsed = new URL(url);
    const apiKey = parsed.searchParams.get('api_key');
    if (!apiKey || !this.options.secret) {
      return { url, updated: false };
    }
    parsed.searchParams.delete('api_key');
    parsed.searchParams.set('token', this.sign(apiKey, parsed.pathname));
    return { url: parsed.toString(), updated: true };
  }

  /**
   * A `watermark` parameter outside the allowed list is consumed: the default
   * watermark is used and the caller is told to drop the parameter.
   */
  async resolveWatermark(query: QueryParams): Promise<ResolvedWatermark> {
    const { defaultWatermark, allowedWatermarks } = this.options;
    const requested = query.watermark;
    if (requested === undefined) {
      return { watermark: defaultWatermark, updated: false };
    }
    if (requested === defaultWatermark || allowedWatermarks.includes(requested)) {
      return { watermark: requested, updated: false };
    }
    return { watermark: defaultWatermark, updated: true };
  }

  private sign(apiKey: string, pathname: string) {
    return createHmac('sha256', this.options.secret ?? '')
      .update(`${apiKey}:${pathname}`)
      .digest('hex')
      .slice(0, 20);
  }
}
