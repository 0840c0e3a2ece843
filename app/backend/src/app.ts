import cors from 'cors';
import express from 'express';
import { z, ZodError } from 'zod';

import { logger } from './logger';
import { queryFrom } from './services/http/urls';
import { ImageResponse, MemeService } from './services/memes/memeService';

const textLinesSchema = z.array(z.string().max(500)).max(10).default([]);

const createSchema = z.object({
  template_id: z.string().min(1),
  text_lines: textLinesSchema,
  style: z.string().optional(),
  extension: z.string().optional(),
  redirect: z.boolean().optional(),
});

const customSchema = z.object({
  background: z.string().optional(),
  text_lines: textLinesSchema,
  style: z.string().optional(),
  extension: z.string().optional(),
  redirect: z.boolean().optional(),
});

// `/:templateId.:extension` and `/:templateId/:textPath.:extension`
const TEMPLATE_PATH = /^\/([^/]+)\.(\w+)$/;
const TEXT_PATH = /^\/([\w-]+)\/([^/].*)\.(\w+)$/;

const CONTENT_TYPES: Record<string, string> = {
  gif: 'image/gif',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
};

const originOf = (req: express.Request) => `${req.protocol}://${req.get('host') ?? 'localhost'}`;

const requestUrl = (req: express.Request) => new URL(req.originalUrl, originOf(req));

const send = (res: express.Response, result: ImageResponse) => {
  if (result.kind === 'redirect') {
    res.redirect(result.status, result.location);
    return;
  }
  res
    .status(result.status)
    .type(CONTENT_TYPES[result.extension] ?? 'application/octet-stream')
    .sendFile(result.path);
};

export interface AppOptions {
  basePath: string;
  memes: MemeService;
}

export function createApp({ basePath, memes }: AppOptions) {
  const app = express();
  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const images = express.Router();

  images.get('/', async (req, res, next) => {
    try {
      const filter = requestUrl(req).searchParams.get('filter') ?? '';
      res.json(await memes.listExamples(originOf(req), filter));
    } catch (error) {
      next(error);
    }
  });

  images.post('/', async (req, res, next) => {
    try {
      const payload = createSchema.parse(req.body ?? {});
      const url = await memes.createUrl(originOf(req), {
        templateId: payload.template_id,
        lines: payload.text_lines,
        style: payload.style,
        extension: payload.extension,
      });
      if (!url) {
        res.status(404).json({ error: `Template not found: ${payload.template_id}` });
        return;
      }
      if (payload.redirect) {
        res.redirect(302, url);
        return;
      }
      res.status(201).json({ url });
    } catch (error) {
      next(error);
    }
  });

  images.post('/custom', (req, res, next) => {
    try {
      const payload = customSchema.parse(req.body ?? {});
      const url = memes.createCustomUrl(originOf(req), {
        background: payload.background,
        lines: payload.text_lines,
        style: payload.style,
        extension: payload.extension,
      });
      if (payload.redirect) {
        res.redirect(302, url);
        return;
      }
      res.status(201).json({ url });
    } catch (error) {
      next(error);
    }
  });

  images.get(TEMPLATE_PATH, async (req, res, next) => {
    try {
      const url = requestUrl(req);
      const result = await memes.displayTemplate({
        templateId: req.params[0],
        extension: req.params[1],
        query: queryFrom(url.searchParams),
        url: url.toString(),
      });
      send(res, result);
    } catch (error) {
      next(error);
    }
  });

  images.get(TEXT_PATH, async (req, res, next) => {
    try {
      const url = requestUrl(req);
      const result = await memes.displayMeme({
        templateId: req.params[0],
        textPath: req.params[1],
        extension: req.params[2],
        query: queryFrom(url.searchParams),
        url: url.toString(),
      });
      send(res, result);
    } catch (error) {
      next(error);
    }
  });

  app.use(basePath, images);

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (err instanceof ZodError) {
        res.status(400).json({ message: err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') });
        return;
      }
      if (err instanceof SyntaxError) {
        res.status(400).json({ message: 'Malformed JSON body' });
        return;
      }
      logger.error(`[API] ${err.message}`);
      res.status(500).json({ message: err.message });
    }
  );

  return app;
}
