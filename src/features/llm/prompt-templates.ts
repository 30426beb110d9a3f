import { readFileSync, existsSync } from 'node:fs';
import type { ReadingContent } from '../scripture/types.js';
import { TemplateError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('prompt');

export const REQUIRED_PLACEHOLDERS = ['date', 'body'] as const;

export const DEFAULT_REFLECTION_TEMPLATE = `Please create a thoughtful and personal Bible diary entry based on the readings for {date}.

Today's Bible Readings:
{body}

Please write a diary entry that:
1. Reflects on the key themes and messages from today's readings
2. Connects the biblical teachings to modern daily life
3. Includes personal insights and practical applications
4. Maintains a warm, contemplative, and inspiring tone
5. Is approximately 300-500 words long

When a Vietnamese passage is provided, quote it where it fits and write the entry in Vietnamese.
`;

export interface PromptAssemblerOptions {
  defaultTemplate?: string;
  /** Heading of the secondary-language block */
  secondaryLabel?: string;
}

export function missingPlaceholders(template: string): string[] {
  return REQUIRED_PLACEHOLDERS.filter(p => !template.includes(`{${p}}`));
}

type Placeholder = (typeof REQUIRED_PLACEHOLDERS)[number];

const isPlaceholder = (key: string): key is Placeholder => REQUIRED_PLACEHOLDERS.some(p => p === key);

// One pass: substituted values are never rescanned, and `$` is inserted literally.
function fill(template: string, values: Record<Placeholder, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => (isPlaceholder(key) ? values[key] : match));
}

export class PromptAssembler {
  private defaultTemplate: string;
  private secondaryLabel: string;

  constructor(opts: PromptAssemblerOptions = {}) {
    this.defaultTemplate = opts.defaultTemplate ?? DEFAULT_REFLECTION_TEMPLATE;
    this.secondaryLabel = opts.secondaryLabel ?? 'Vietnamese text (Bản Việt ngữ)';
    const missing = missingPlaceholders(this.defaultTemplate);
    if (missing.length) throw new TemplateError(missing);
  }

  /** The reading block substituted for `{body}`. */
  formatReading(content: ReadingContent): string {
    const sections: string[] = [`Date: ${content.date}`];
    if (content.citation) {
      sections.push(content.citationLink ? `Citation: ${content.citation} (${content.citationLink})` : `Citation: ${content.citation}`);
    }
    const body = content.body.trim();
    if (body) sections.push(body);
    const ref = content.resolvedReference;
    if (ref) sections.push(`${this.secondaryLabel} - ${ref.reference}:\n${ref.text}`);
    return sections.join('\n\n');
  }

  assemble(content: ReadingContent, template?: string): string {
    const tpl = template ?? this.defaultTemplate;
    const missing = missingPlaceholders(tpl);
    if (missing.length) throw new TemplateError(missing);
    return fill(tpl, { date: content.date, body: this.formatReading(content) });
  }
}

/**
 * Template text from `path` when the file exists, else the default. The
 * returned template is validated either way.
 */
export function loadPromptTemplate(path?: string, fallback: string = DEFAULT_REFLECTION_TEMPLATE): string {
  let template = fallback;
  if (path) {
    if (existsSync(path)) {
      template = readFileSync(path, 'utf-8');
      log.info('template:loaded', { path });
    } else {
      log.warn('template:missing', { path });
    }
  }
  const missing = missingPlaceholders(template);
  if (missing.length) throw new TemplateError(missing);
  return template;
}
