import { createHash } from 'crypto';
import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { z } from 'zod';

import { logger } from '../../logger';
import { exists } from '../../utils/files';
import { isSchemeLike } from '../http/urls';
import { ImageDownloader } from './imageDownloader';
import { Template, TemplateRepository } from './types';

const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'webp', 'svg'];
const TEMPLATE_ID = /^[\w-]+$/;
const METADATA_FILE = 'config.json';

const metadataSchema = z.object({
  name: z.string(),
  example: z.array(z.string()).default([]),
  source: z.string().optional(),
});

const hash = (value: string) => createHash('sha1').update(value).digest('hex').slice(0, 16);

export const customTemplateId = (url: string) => `_custom-${hash(url)}`;

const overlayName = (url: string) => `_style-${hash(url)}`;

interface FileTemplateRepositoryOptions {
  templatesDir: string;
  defaultStyle: string;
  download: ImageDownloader;
}

/**
 * Templates stored one per directory: a `config.json` with the name and
 * example lines, a `default.<ext>` background, and one `<style>.<ext>` file
 * per alternate style.
 */
export class FileTemplateRepository implements TemplateRepository {
  private readonly cache = new Map<string, Template>();
  private readonly pending = new Map<string, Promise<Template>>();

  constructor(private readonly options: FileTemplateRepositoryOptions) {}

  async get(id: string): Promise<Template | undefined> {
    if (!TEMPLATE_ID.test(id)) {
      return undefined;
    }
    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }
    const template = await this.load(id);
    if (template) {
      this.cache.set(id, template);
    }
    return template;
  }

  async list(): Promise<Template[]> {
    const entries = await readdir(this.options.templatesDir, { withFileTypes: true });
    const templates: Template[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const template = await this.get(entry.name);
      if (template) templates.push(template);
    }
    return templates.sort((a, b) => a.id.localeCompare(b.id));
  }

  createFromUrl(url: string): Promise<Template> {
    const id = customTemplateId(url);
    const inflight = this.pending.get(id);
    if (inflight) {
      return inflight;
    }
    const creation = this.create(id, url).finally(() => this.pending.delete(id));
    this.pending.set(id, creation);
    return creation;
  }

  async hasImage(template: Template): Promise<boolean> {
    return (await this.imagePath(template, this.options.defaultStyle)) !== undefined;
  }

  async supportsStyle(template: Template, style: string): Promise<boolean> {
    if (!style || style === this.options.defaultStyle || template.styles.includes(style)) {
      return true;
    }
    if (!isSchemeLike(style)) {
      return false;
    }
    if (await this.imagePath(template, style)) {
      return true;
    }
    const buffer = await this.options.download(style);
    if (!buffer) {
      return false;
    }
    return this.storeImage(buffer, path.join(template.directory, `${overlayName(style)}.png`));
  }

  async imagePath(template: Template, style = this.options.defaultStyle): Promise<string | undefined> {
    if (isSchemeLike(style)) {
      const overlay = path.join(template.directory, `${overlayName(style)}.png`);
      return (await exists(overlay)) ? overlay : undefined;
    }
    for (const extension of IMAGE_EXTENSIONS) {
      const candidate = path.join(template.directory, `${style}.${extension}`);
      if (await exists(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private async load(id: string): Promise<Template | undefined> {
    const directory = path.join(this.options.templatesDir, id);
    let raw: string;
    try {
      raw = await readFile(path.join(directory, METADATA_FILE), 'utf-8');
    } catch {
      return undefined;
    }
    let metadata: unknown;
    try {
      metadata = JSON.parse(raw);
    } catch (error) {
      logger.warn(`[Templates] Unreadable metadata for ${id}: ${(error as Error).message}`);
      return undefined;
    }
    const parsed = metadataSchema.safeParse(metadata);
    if (!parsed.success) {
      logger.warn(`[Templates] Invalid metadata for ${id}: ${parsed.error.message}`);
      return undefined;
    }
    const files = await readdir(directory);
    const styles = new Set<string>();
    for (const file of files) {
      const extension = path.extname(file).slice(1).toLowerCase();
      const style = path.basename(file, path.extname(file));
      if (IMAGE_EXTENSIONS.includes(extension) && style !== this.options.defaultStyle && !style.startsWith('_')) {
        styles.add(style);
      }
    }
    return {
      id,
      directory,
      name: parsed.data.name,
      example: parsed.data.example,
      source: parsed.data.source,
      styles: [...styles].sort(),
    };
  }

  private async create(id: string, url: string): Promise<Template> {
    const existing = await this.get(id);
    if (existing && (await this.hasImage(existing))) {
      return existing;
    }

    const directory = path.join(this.options.templatesDir, id);
    await mkdir(directory, { recursive: true });
    const buffer = await this.options.download(url);
    if (buffer) {
      await this.storeImage(buffer, path.join(directory, `${this.options.defaultStyle}.png`));
    }
    await writeFile(
      path.join(directory, METADATA_FILE),
      JSON.stringify({ name: url, example: [], source: url }, null, 2),
      'utf-8'
    );

    this.cache.delete(id);
    const template = await this.get(id);
    if (!template) {
      throw new Error(`Unable to create template for ${url}`);
    }
    logger.info(`[Templates] Created ${id} from ${url}`);
    return template;
  }

  private async storeImage(buffer: Buffer, destination: string): Promise<boolean> {
    try {
      await sharp(buffer).png().toFile(destination);
      return true;
    } catch (error) {
      logger.warn(`[Templates] Unusable image for ${destination}: ${(error as Error).message}`);
      return false;
    }
  }
}
