import { mkdir, mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ResolvedJob } from '../memes/resolution';
import { FileTemplateRepository } from '../templates/templateRepository';
import { buildCaptionSvg, buildWatermarkSvg, MemeRenderer } from './memeRenderer';

let workDir: string;
let templates: FileTemplateRepository;
let renderer: MemeRenderer;

const job = async (overrides: Partial<ResolvedJob> = {}): Promise<ResolvedJob> => {
  const template = await templates.get('sky');
  if (!template) throw new Error('fixture missing');
  return {
    template,
    style: 'default',
    lines: [],
    watermark: '',
    extension: 'png',
    size: { width: 0, height: 0 },
    status: 200,
    ...overrides,
  };
};

beforeEach(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), 'render-'));
  const templatesDir = path.join(workDir, 'templates');
  await mkdir(path.join(templatesDir, 'sky'), { recursive: true });
  await mkdir(path.join(templatesDir, 'blank'), { recursive: true });
  await writeFile(path.join(templatesDir, 'sky', 'config.json'), JSON.stringify({ name: 'Sky' }));
  await writeFile(path.join(templatesDir, 'blank', 'config.json'), JSON.stringify({ name: 'Blank' }));
  await sharp({ create: { width: 80, height: 40, channels: 3, background: '#3366cc' } })
    .png()
    .toFile(path.join(templatesDir, 'sky', 'default.png'));

  templates = new FileTemplateRepository({
    templatesDir,
    defaultStyle: 'default',
    download: async () => undefined,
  });
  renderer = new MemeRenderer({ imagesDir: path.join(workDir, 'images'), templates });
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe('MemeRenderer', () => {
  it('should render the template image in the requested format', async () => {
    const output = await renderer.render(await job({ extension: 'jpg' }));

    expect(path.isAbsolute(output)).toBe(true);
    expect(output.endsWith('.jpg')).toBe(true);
    const metadata = await sharp(output).metadata();
    expect(metadata.format).toBe('jpeg');
    expect([metadata.width, metadata.height]).toEqual([80, 40]);
  });

  it('should resize to the requested dimensions', async () => {
    const output = await renderer.render(await job({ size: { width: 40, height: 40 } }));

    const metadata = await sharp(output).metadata();
    expect([metadata.width, metadata.height]).toEqual([40, 40]);
  });

  it('should keep the aspect ratio when only the width is given', async () => {
    const output = await renderer.render(await job({ size: { width: 40, height: 0 } }));

    const metadata = await sharp(output).metadata();
    expect([metadata.width, metadata.height]).toEqual([40, 20]);
  });

  it('should reuse a cached render for the same job', async () => {
    const first = await renderer.render(await job());
    const second = await renderer.render(await job());

    expect(second).toBe(first);
  });

  it('should share one render between concurrent identical jobs', async () => {
    const [first, second] = await Promise.all([renderer.render(await job()), renderer.render(await job())]);

    expect(second).toBe(first);
    expect(await readdir(path.dirname(first))).toEqual([path.basename(first)]);
    const metadata = await sharp(first).metadata();
    expect([metadata.width, metadata.height]).toEqual([80, 40]);
  });

  it('should render captions containing control characters', async () => {
    const output = await renderer.render(await job({ lines: ['hi\u0001there'], watermark: 'a\u001fb' }));

    const metadata = await sharp(output).metadata();
    expect(metadata.format).toBe('png');
  });

  it('should render a blank canvas for a template without an image', async () => {
    const template = await templates.get('blank');
    if (!template) throw new Error('fixture missing');

    const output = await renderer.render(await job({ template }));

    const metadata = await sharp(output).metadata();
    expect([metadata.width, metadata.height]).toEqual([600, 600]);
  });
});

describe('buildCaptionSvg', () => {
  it('should uppercase and escape each line', () => {
    const svg = buildCaptionSvg(['a<b'], { width: 100, height: 90 });

    expect(svg).toContain('y="13"');
    expect(svg).toContain('>A&#60;B</text>');
  });

  it('should drop characters XML cannot represent', () => {
    const svg = buildCaptionSvg(['hi\u0001\u000bthere\ttab'], { width: 100, height: 90 });

    expect(svg).toContain('>HITHERE\tTAB</text>');
  });

  it('should skip blank lines', () => {
    const svg = buildCaptionSvg(['', 'bottom'], { width: 100, height: 90 });

    expect(svg.match(/<text /g)).toHaveLength(1);
    expect(svg).toContain('>BOTTOM</text>');
  });
});

describe('buildWatermarkSvg', () => {
  it('should place the escaped watermark in the bottom-left corner', () => {
    const svg = buildWatermarkSvg('a&b', { width: 400, height: 400 });

    expect(svg).toContain('x="5" y="395"');
    expect(svg).toContain('>a&#38;b</text>');
  });

  it('should drop control characters from the watermark', () => {
    const svg = buildWatermarkSvg('a\u0000b', { width: 400, height: 400 });

    expect(svg).toContain('>ab</text>');
  });
});
