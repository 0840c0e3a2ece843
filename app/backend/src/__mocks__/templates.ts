import { PipelineConfig } from '../config';
import { isSchemeLike } from '../services/http/urls';
import { Template, TemplateRepository } from '../services/templates/types';

export const testConfig: PipelineConfig = Object.freeze({
  allowedExtensions: ['gif', 'jpg', 'png', 'webp'],
  defaultExtension: 'png',
  defaultStyle: 'default',
  placeholder: 'string',
  errorTemplateId: '_error',
  maxSegmentBytes: 200,
  truncatedSlugLength: 50,
});

export interface FakeTemplate {
  id: string;
  styles?: string[];
  example?: string[];
  hasImage?: boolean;
}

/**
 * Template repository kept in memory. Custom templates get an image only when
 * their URL is listed in `downloadable`; the same list decides which URL
 * styles can be fetched.
 */
export class InMemoryTemplateRepository implements TemplateRepository {
  readonly created: string[] = [];
  private readonly templates = new Map<string, { template: Template; image: boolean }>();

  constructor(
    entries: FakeTemplate[],
    private readonly downloadable: string[] = []
  ) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  add({ id, styles = [], example = [], hasImage = true }: FakeTemplate, source?: string): Template {
    const template: Template = { id, name: id, directory: `/fake/${id}`, styles, example, source };
    this.templates.set(id, { template, image: hasImage });
    return template;
  }

  async get(id: string) {
    return this.templates.get(id)?.template;
  }

  async list() {
    return [...this.templates.values()].map(({ template }) => template);
  }

  async createFromUrl(url: string) {
    this.created.push(url);
    return this.add({ id: `_custom-${this.created.length}`, hasImage: this.downloadable.includes(url) }, url);
  }

  async hasImage(template: Template) {
    return this.templates.get(template.id)?.image ?? false;
  }

  async supportsStyle(template: Template, style: string) {
    if (!style || style === testConfig.defaultStyle || template.styles.includes(style)) {
      return true;
    }
    return isSchemeLike(style) && this.downloadable.includes(style);
  }

  async imagePath(template: Template, style = testConfig.defaultStyle) {
    return (await this.hasImage(template)) ? `${template.directory}/${style}.png` : undefined;
  }
}
