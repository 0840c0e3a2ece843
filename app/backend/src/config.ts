import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

const settingsSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535),
    basePath: z.string().startsWith('/').default('/images'),
  }),
  storage: z.object({
    templatesDir: z.string(),
    imagesDir: z.string(),
  }),
  rendering: z.object({
    defaultStyle: z.string().min(1),
    defaultExtension: z.string().min(1),
    allowedExtensions: z.array(z.string().min(1)).nonempty(),
    placeholder: z.string().min(1),
    errorTemplate: z.string().min(1),
    maxSegmentBytes: z.number().int().positive().default(200),
    truncatedSlugLength: z.number().int().positive().default(50),
  }),
  attribution: z.object({
    defaultWatermark: z.string().default(''),
    allowedWatermarks: z.array(z.string()).default([]),
    secret: z.string().optional(),
    trackingUrl: z.string().url().optional(),
    trackingRetries: z.number().int().min(0).default(2),
    trackingMaxQueued: z.number().int().positive().default(1000),
  }),
  downloads: z.object({
    timeoutMs: z.number().int().positive(),
    maxBytes: z.number().int().positive(),
  }),
});

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Values the resolution pipeline depends on. Passed in explicitly so the
 * cascade never reads ambient state.
 */
export interface PipelineConfig {
  readonly allowedExtensions: readonly string[];
  readonly defaultExtension: string;
  readonly defaultStyle: string;
  readonly placeholder: string;
  readonly errorTemplateId: string;
  readonly maxSegmentBytes: number;
  readonly truncatedSlugLength: number;
}

/**
 * Validates raw settings and resolves storage directories against `baseDir`.
 * Environment variables win over file values for the port and attribution
 * secrets.
 */
export const parseSettings = (
  raw: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env
): Settings => {
  const settings = settingsSchema.parse(raw);
  const port = env.PORT ? Number.parseInt(env.PORT, 10) : Number.NaN;
  return {
    ...settings,
    server: {
      ...settings.server,
      port: Number.isInteger(port) ? port : settings.server.port,
    },
    storage: {
      templatesDir: path.resolve(baseDir, settings.storage.templatesDir),
      imagesDir: path.resolve(baseDir, settings.storage.imagesDir),
    },
    attribution: {
      ...settings.attribution,
      secret: env.ATTRIBUTION_SECRET ?? settings.attribution.secret,
      trackingUrl: env.TRACKING_URL ?? settings.attribution.trackingUrl,
    },
  };
};

export const toPipelineConfig = (settings: Settings): PipelineConfig =>
  Object.freeze({
    allowedExtensions: Object.freeze([...settings.rendering.allowedExtensions]),
    defaultExtension: settings.rendering.defaultExtension,
    defaultStyle: settings.rendering.defaultStyle,
    placeholder: settings.rendering.placeholder,
    errorTemplateId: settings.rendering.errorTemplate,
    maxSegmentBytes: settings.rendering.maxSegmentBytes,
    truncatedSlugLength: settings.rendering.truncatedSlugLength,
  });

export class SettingsService {
  private static instance: SettingsService;
  private config?: Settings;

  private constructor() {}

  static getInstance() {
    if (!SettingsService.instance) {
      SettingsService.instance = new SettingsService();
    }
    return SettingsService.instance;
  }

  async load(): Promise<Settings> {
    if (this.config) {
      return this.config;
    }
    const settingsPath =
      process.env.MEMESMITH_SETTINGS ??
      path.resolve(process.cwd(), 'app/config/settings.json');
    const file = await readFile(settingsPath, 'utf-8');
    this.config = parseSettings(JSON.parse(file), path.dirname(settingsPath));
    return this.config;
  }
}
