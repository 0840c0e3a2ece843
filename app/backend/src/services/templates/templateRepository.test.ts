import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import { ImageDownloader } from './imageDownloader';
import { customTemplateId, FileTemplateRepository } from './templateRepository';

const png = () =>
  sharp({ create: { width: 20, height: 20, channels: 3, background: '#ff0000' } }).png().toBuffer();

let templatesDir: string;
let download: Mock<ImageDownloader>;
let repository: FileTemplateRepository;

const addTemplate = async (id: string, metadata: unknown, images: string[]) => {
  const directory = path.join(templatesDir, id);
  await mkdir(directory, { recursive: true });
  await writeFile(path.join(directory, 'config.json'), JSON.stringify(metadata));
  for (const image of images) {
    await writeFile(path.join(directory, image), await png());
  }
};

beforeEach(async () => {
  templatesDir = await mkdtemp(path.join(tmpdir(), 'templates-'));
  download = vi.fn<ImageDownloader>();
  repository = new FileTemplateRepository({ templatesDir, defaultStyle: 'default', download });
  await addTemplate('sky', { name: 'Open Sky', example: ['top', 'bottom'] }, ['default.png', 'night.png', '_style-x.png']);
  await addTemplate('empty', { name: 'Empty' }, []);
});

afterEach(async () => {
  await rm(templatesDir, { recursive: true, force: true });
});

describe('FileTemplateRepository.get', () => {
  it('should load metadata and styles', async () => {
    const template = await repository.get('sky');

    expect(template).toEqual({
      id: 'sky',
      name: 'Open Sky',
      directory: path.join(templatesDir, 'sky'),
      example: ['top', 'bottom'],
      source: undefined,
      styles: ['night'],
    });
  });

  it('should return undefined for unknown or unsafe ids', async () => {
    expect(await repository.get('nope')).toBeUndefined();
    expect(await repository.get('../sky')).toBeUndefined();
  });

  it('should skip templates with invalid metadata', async () => {
    await addTemplate('bad', { title: 'no name' }, ['default.png']);

    expect(await repository.get('bad')).toBeUndefined();
  });
});

describe('FileTemplateRepository.list', () => {
  it('should list valid templates sorted by id', async () => {
    const templates = await repository.list();

    expect(templates.map((template) => template.id)).toEqual(['empty', 'sky']);
  });
});

describe('FileTemplateRepository images and styles', () => {
  it('should report whether the default image exists', async () => {
    const sky = await repository.get('sky');
    const empty = await repository.get('empty');
    if (!sky || !empty) throw new Error('fixtures missing');

    expect(await repository.hasImage(sky)).toBe(true);
    expect(await repository.hasImage(empty)).toBe(false);
    expect(await repository.imagePath(sky, 'night')).toBe(path.join(templatesDir, 'sky', 'night.png'));
  });

  it('should check style membership', async () => {
    const sky = await repository.get('sky');
    if (!sky) throw new Error('fixture missing');

    expect(await repository.supportsStyle(sky, 'default')).toBe(true);
    expect(await repository.supportsStyle(sky, 'night')).toBe(true);
    expect(await repository.supportsStyle(sky, 'bogus')).toBe(false);
    expect(download).not.toHaveBeenCalled();
  });

  it('should download URL styles once', async () => {
    const sky = await repository.get('sky');
    if (!sky) throw new Error('fixture missing');
    download.mockResolvedValue(await png());

    expect(await repository.supportsStyle(sky, 'https://img.test/overlay.png')).toBe(true);
    expect(await repository.supportsStyle(sky, 'https://img.test/overlay.png')).toBe(true);
    expect(await repository.imagePath(sky, 'https://img.test/overlay.png')).toBeDefined();
    expect(download).toHaveBeenCalledTimes(1);
  });

  it('should reject URL styles that cannot be downloaded', async () => {
    const sky = await repository.get('sky');
    if (!sky) throw new Error('fixture missing');
    download.mockResolvedValue(undefined);

    expect(await repository.supportsStyle(sky, 'https://img.test/missing.png')).toBe(false);
  });
});

describe('FileTemplateRepository.createFromUrl', () => {
  it('should create a template with the downloaded image', async () => {
    download.mockResolvedValue(await png());

    const template = await repository.createFromUrl('https://img.test/ok.png');

    expect(template.id).toBe(customTemplateId('https://img.test/ok.png'));
    expect(template.source).toBe('https://img.test/ok.png');
    expect(await repository.hasImage(template)).toBe(true);
  });

  it('should share one download between concurrent requests', async () => {
    download.mockResolvedValue(await png());

    const [first, second] = await Promise.all([
      repository.createFromUrl('https://img.test/ok.png'),
      repository.createFromUrl('https://img.test/ok.png'),
    ]);

    expect(first).toBe(second);
    expect(download).toHaveBeenCalledTimes(1);
  });

  it('should create a template without an image when the download fails', async () => {
    download.mockResolvedValue(undefined);

    const template = await repository.createFromUrl('http://bad.example/x.png');

    expect(await repository.hasImage(template)).toBe(false);
  });

  it('should not keep bytes that are not an image', async () => {
    download.mockResolvedValue(Buffer.from('not an image'));

    const template = await repository.createFromUrl('https://img.test/text.png');

    expect(await repository.hasImage(template)).toBe(false);
  });
});
