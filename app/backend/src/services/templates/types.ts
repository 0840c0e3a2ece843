export interface Template {
  id: string;
  name: string;
  directory: string;
  /** Alternate images available besides the default one. */
  styles: string[];
  example: string[];
  source?: string;
}

export interface TemplateRepository {
  get(id: string): Promise<Template | undefined>;
  list(): Promise<Template[]>;
  /** Creates (or reuses) a template whose background is downloaded from `url`. */
  createFromUrl(url: string): Promise<Template>;
  hasImage(template: Template): Promise<boolean>;
  supportsStyle(template: Template, style: string): Promise<boolean>;
  /** Image file for a style, or `undefined` when there is none on disk. */
  imagePath(template: Template, style?: string): Promise<string | undefined>;
}
