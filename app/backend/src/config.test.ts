import path from 'path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { parseSettings, toPipelineConfig } from './config';

const raw = {
  server: { port: 5000 },
  storage: { templatesDir: '../templates', imagesDir: '/var/cache/images' },
  rendering: {
    defaultStyle: 'default',
    defaultExtension: 'png',
    allowedExtensions: ['gif', 'jpg', 'png'],
    placeholder: 'string',
    errorTemplate: '_error',
  },
  attribution: {},
  downloads: { timeoutMs: 5000, maxBytes: 1024 },
};

describe('parseSettings', () => {
  it('should apply defaults and resolve directories against the settings file', () => {
    const settings = parseSettings(raw, '/srv/app/config', {});

    expect(settings.server).toEqual({ port: 5000, basePath: '/images' });
    expect(settings.storage).toEqual({
      templatesDir: path.resolve('/srv/app/config', '../templates'),
      imagesDir: path.resolve('/var/cache/images'),
    });
    expect(settings.rendering.maxSegmentBytes).toBe(200);
    expect(settings.rendering.truncatedSlugLength).toBe(50);
    expect(settings.attribution).toEqual({
      defaultWatermark: '',
      allowedWatermarks: [],
      secret: undefined,
      trackingUrl: undefined,
      trackingRetries: 2,
      trackingMaxQueued: 1000,
    });
  });

  it('should let the environment override the port and attribution secrets', () => {
    const settings = parseSettings(raw, '/srv/app/config', {
      PORT: '8080',
      ATTRIBUTION_SECRET: 'test-secret',
      TRACKING_URL: 'http://tracking.test/events',
    });

    expect(settings.server.port).toBe(8080);
    expect(settings.attribution.secret).toBe('test-secret');
    expect(settings.attribution.trackingUrl).toBe('http://tracking.test/events');
  });

  it('should reject incomplete settings', () => {
    expect(() => parseSettings({ ...raw, rendering: { defaultStyle: 'default' } }, '/srv', {})).toThrow(ZodError);
  });
});

describe('toPipelineConfig', () => {
  it('should expose a frozen pipeline configuration', () => {
    const config = toPipelineConfig(parseSettings(raw, '/srv/app/config', {}));

    expect(config).toEqual({
      allowedExtensions: ['gif', 'jpg', 'png'],
      defaultExtension: 'png',
      defaultStyle: 'default',
      placeholder: 'string',
      errorTemplateId: '_error',
      maxSegmentBytes: 200,
      truncatedSlugLength: 50,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.allowedExtensions)).toBe(true);
  });
});
