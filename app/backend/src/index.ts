import { createServer } from 'http';

import { createApp } from './app';
import { SettingsService, toPipelineConfig } from './config';
import { logger } from './logger';
import { AttributionService } from './services/attribution/attributionService';
import { MemeService } from './services/memes/memeService';
import { MemeRenderer } from './services/render/memeRenderer';
import { createImageDownloader } from './services/templates/imageDownloader';
import { FileTemplateRepository } from './services/templates/templateRepository';
import { slugCodec } from './services/text/slugCodec';
import { TrackingQueue } from './services/tracking/trackingQueue';

async function bootstrap() {
  const settings = await SettingsService.getInstance().load();
  const config = toPipelineConfig(settings);

  const templates = new FileTemplateRepository({
    templatesDir: settings.storage.templatesDir,
    defaultStyle: config.defaultStyle,
    download: createImageDownloader(settings.downloads),
  });
  if (!(await templates.get(config.errorTemplateId))) {
    throw new Error(`Error template "${config.errorTemplateId}" not found in ${settings.storage.templatesDir}`);
  }

  const tracking = new TrackingQueue({
    endpoint: settings.attribution.trackingUrl,
    retries: settings.attribution.trackingRetries,
    maxQueued: settings.attribution.trackingMaxQueued,
  });

  const memes = new MemeService({
    basePath: settings.server.basePath,
    config,
    templates,
    renderer: new MemeRenderer({ imagesDir: settings.storage.imagesDir, templates }),
    attribution: new AttributionService({
      secret: settings.attribution.secret,
      defaultWatermark: settings.attribution.defaultWatermark,
      allowedWatermarks: settings.attribution.allowedWatermarks,
    }),
    tracking,
    codec: slugCodec,
  });

  const app = createApp({ basePath: settings.server.basePath, memes });
  const server = createServer(app);

  server.listen(settings.server.port, () => {
    logger.info(`Image API listening on http://localhost:${settings.server.port}${settings.server.basePath}`);
  });

  const gracefulShutdown = () => {
    logger.info(`Shutting down (tracking: ${JSON.stringify(tracking.getMetrics())})`);
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);
}

bootstrap().catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
