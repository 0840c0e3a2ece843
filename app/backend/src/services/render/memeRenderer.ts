import { createHash } from 'crypto';
import { mkdir, rename, rm } from 'fs/promises';
import path from 'path';
import sharp, { OverlayOptions, Sharp } from 'sharp';

import { logger } from '../../logger';
import { exists } from '../../utils/files';
import { isSchemeLike } from '../http/urls';
import { ResolvedJob, Size } from '../memes/resolution';
import { TemplateRepository } from '../templates/types';

export interface Renderer {
  /** Renders the job and resolves the absolute path of the image file. */
  render(job: ResolvedJob): Promise<string>;
}

const FALLBACK_SIZE: Size = { width: 600, height: 600 };

interface MemeRendererOptions {
  imagesDir: string;
  templates: TemplateRepository;
}

// Control characters XML 1.0 cannot represent, even as character references.
// eslint-disable-next-line no-control-regex
const XML_INVALID = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

const escapeXml = (value: string) =>
  value.replace(XML_INVALID, '').replace(/[<>&'"]/g, (char) => `&#${char.charCodeAt(0)};`);

/**
 * SVG layer with one caption per line: the first line at the top, the last
 * at the bottom, any others spread evenly in between.
 */
export const buildCaptionSvg = (lines: readonly string[], { width, height }: Size): string => {
  const visible = lines.map((line, index) => ({ line, index })).filter(({ line }) => line.trim());
  const fontSize = Math.max(12, Math.round(height / 9));
  const texts = visible.map(({ line, index }) => {
    const position = lines.length === 1 ? 0 : index / (lines.length - 1);
    const y = Math.round(fontSize * 1.1 + position * (height - fontSize * 1.6));
    return `<text x="50%" y="${y}" font-size="${fontSize}" fill="#ffffff" stroke="#000000" stroke-width="${Math.max(
      1,
      Math.round(fontSize / 15)
    )}" text-anchor="middle" font-family="Impact, Inter, sans-serif" font-weight="700">${escapeXml(
      line.toUpperCase()
    )}</text>`;
  });
  return `<svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">${texts.join('')}</svg>`;
};

export const buildWatermarkSvg = (watermark: string, { width, height }: Size): string => {
  const fontSize = Math.max(10, Math.round(height / 40));
  return `<svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg"><text x="${Math.round(
    fontSize / 2
  )}" y="${height - Math.round(fontSize / 2)}" font-size="${fontSize}" fill="rgba(255,255,255,0.7)" font-family="Inter, sans-serif">${escapeXml(
    watermark
  )}</text></svg>`;
};

export class MemeRenderer implements Renderer {
  private readonly pending = new Map<string, Promise<string>>();

  constructor(private readonly options: MemeRendererOptions) {}

  async render(job: ResolvedJob): Promise<string> {
    const outputPath = path.resolve(this.options.imagesDir, job.template.id, `${this.cacheKey(job)}.${job.extension}`);
    if (await exists(outputPath)) {
      return outputPath;
    }

    const inflight = this.pending.get(outputPath);
    if (inflight) {
      return inflight;
    }
    const rendering = this.renderTo(job, outputPath).finally(() => this.pending.delete(outputPath));
    this.pending.set(outputPath, rendering);
    return rendering;
  }

  private async renderTo(job: ResolvedJob, outputPath: string): Promise<string> {
    const base = await this.buildBase(job);
    const { data, info } = await base.png().toBuffer({ resolveWithObject: true });
    const canvas = { width: info.width, height: info.height };
    const composites: OverlayOptions[] = [];

    if (isSchemeLike(job.style)) {
      const overlay = await this.options.templates.imagePath(job.template, job.style);
      if (overlay) {
        const overlayWidth = Math.max(1, Math.round(canvas.width / 3));
        composites.push({
          input: await sharp(overlay).resize(overlayWidth, overlayWidth, { fit: 'inside' }).png().toBuffer(),
          gravity: 'centre',
        });
      }
    }
    if (job.lines.some((line) => line.trim())) {
      composites.push({ input: Buffer.from(buildCaptionSvg(job.lines, canvas)), left: 0, top: 0 });
    }
    if (job.watermark) {
      composites.push({ input: Buffer.from(buildWatermarkSvg(job.watermark, canvas)), left: 0, top: 0 });
    }

    // Readers only ever see complete files: write beside the target, then rename.
    const partialPath = `${outputPath}.${process.pid}-${Date.now()}.partial`;
    await mkdir(path.dirname(outputPath), { recursive: true });
    try {
      await this.encode(sharp(data).composite(composites), job.extension).toFile(partialPath);
      await rename(partialPath, outputPath);
    } catch (error) {
      await rm(partialPath, { force: true });
      throw error;
    }
    logger.info(`[Render] ${job.template.id} (${job.style}) -> ${outputPath}`);
    return outputPath;
  }

  private async buildBase(job: ResolvedJob): Promise<Sharp> {
    const { templates } = this.options;
    const style = isSchemeLike(job.style) ? undefined : job.style;
    const asset =
      (style && (await templates.imagePath(job.template, style))) ||
      (await templates.imagePath(job.template));
    const { width, height } = job.size;

    if (!asset) {
      logger.warn(`[Render] Missing image for ${job.template.id}, using a blank canvas`);
      return sharp({
        create: {
          width: width || FALLBACK_SIZE.width,
          height: height || FALLBACK_SIZE.height,
          channels: 4,
          background: '#0e0e0e',
        },
      });
    }

    const image = sharp(asset, { animated: false });
    if (width && height) {
      return image.resize(width, height, { fit: 'contain', background: '#000000' });
    }
    if (width || height) {
      return image.resize(width || undefined, height || undefined, { fit: 'inside' });
    }
    return image;
  }

  private encode(image: Sharp, extension: string): Sharp {
    switch (extension) {
      case 'jpg':
      case 'jpeg':
        return image.flatten({ background: '#ffffff' }).jpeg({ quality: 95 });
      case 'gif':
        return image.gif();
      case 'webp':
        return image.webp({ quality: 90 });
      default:
        return image.png();
    }
  }

  private cacheKey(job: ResolvedJob) {
    return createHash('sha1')
      .update(
        JSON.stringify([job.template.id, job.style, job.lines, job.watermark, job.size.width, job.size.height])
      )
      .digest('hex')
      .slice(0, 20);
  }
}
