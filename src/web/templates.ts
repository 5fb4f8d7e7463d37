import handlebars from 'handlebars';
import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';

export type PageName = 'index' | 'repo_details' | 'history' | 'error';

const PAGES: readonly PageName[] = ['index', 'repo_details', 'history', 'error'];

const TEMPLATE_DIR = new URL('./templates/', import.meta.url);

const readTemplate = (name: string): string => readFileSync(new URL(`${name}.hbs`, TEMPLATE_DIR), 'utf8');

/**
 * Stable hue in [0, 360) derived from a string, used for avatar placeholders
 */
export const hueFor = (value: string): number =>
  parseInt(createHash('md5').update(value).digest('hex').slice(0, 8), 16) % 360;

/**
 * Page renderer with its own Handlebars environment, so helpers and partials
 * never leak into the global instance.
 */
export class WebTemplates {
  private readonly engine = handlebars.create();
  private readonly pages = new Map<PageName, HandlebarsTemplateDelegate>();

  constructor() {
    this.registerHelpers();
    this.engine.registerPartial('layout', readTemplate('layout'));
    for (const page of PAGES) {
      this.pages.set(page, this.engine.compile(readTemplate(page)));
    }
  }

  render(page: PageName, context: object): string {
    const template = this.pages.get(page);
    if (!template) {
      throw new Error(`Unknown page template: ${page}`);
    }
    return template(context);
  }

  private registerHelpers(): void {
    this.engine.registerHelper('formatNumber', (num: unknown) => {
      if (typeof num !== 'number') return num;
      return new Intl.NumberFormat('en-US').format(num);
    });

    this.engine.registerHelper('formatDate', (date: unknown) => {
      if (typeof date !== 'string') return '';
      const d = new Date(date);
      if (isNaN(d.getTime())) return date;
      return d.toISOString().replace('T', ' ').slice(0, 16);
    });

    this.engine.registerHelper('avatarColor', (value: unknown) => `hsl(${hueFor(String(value))}, 60%, 45%)`);

    this.engine.registerHelper('initial', (value: unknown) =>
      typeof value === 'string' && value.length > 0 ? value.charAt(0).toUpperCase() : '?'
    );

    this.engine.registerHelper('eq', (a: unknown, b: unknown) => a === b);
  }
}
