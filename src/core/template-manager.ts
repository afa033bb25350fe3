import * as fs from 'fs-extra';
import * as path from 'path';
import { TemplateId } from '../types';
import { MissingContextError, Req2CodeError } from './errors';
import { logger } from './logger';

export type PromptContext = Readonly<Record<string, string>>;

export const BUILTIN_TEMPLATE_IDS: readonly TemplateId[] = [
  'requirement-analysis',
  'coding',
  'review-balanced',
  'review-strict',
  'documentation',
  'test-generation',
  'deployment',
];

// Source tree (src/core) and compiled tree (dist/src/core) both resolve to <root>/templates/builtin
const BUILTIN_TEMPLATE_DIRS = [
  path.join(__dirname, '../../templates/builtin'),
  path.join(__dirname, '../../../templates/builtin'),
];

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_.]+)\s*\}\}/g;

export interface TemplateManagerOptions {
  /** Directory whose `<id>.md` files take precedence over builtin templates */
  customPath?: string;
  builtinDirs?: string[];
}

/**
 * Loads prompt templates by id and fills their `{{key}}` placeholders.
 */
export class TemplateManager {
  private customPath?: string;
  private builtinDirs: string[];
  private cache = new Map<string, string>();

  constructor(options: TemplateManagerOptions = {}) {
    this.customPath = options.customPath;
    this.builtinDirs = options.builtinDirs || BUILTIN_TEMPLATE_DIRS;
  }

  /**
   * Keys referenced by a template, in order of first appearance.
   */
  static referencedKeys(template: string): string[] {
    const keys: string[] = [];
    for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
      if (!keys.includes(match[1])) {
        keys.push(match[1]);
      }
    }
    return keys;
  }

  /**
   * Substitute every placeholder. Empty strings are valid values; absent keys are not.
   */
  static render(templateId: string, template: string, context: PromptContext): string {
    const missing = TemplateManager.referencedKeys(template).filter(key => typeof context[key] !== 'string');
    if (missing.length > 0) {
      throw new MissingContextError(templateId, missing);
    }
    return template.replace(PLACEHOLDER_PATTERN, (_match, key: string) => context[key]);
  }

  async loadTemplate(templateId: string): Promise<string> {
    const cached = this.cache.get(templateId);
    if (cached !== undefined) {
      return cached;
    }

    const templatePath = await this.resolveTemplatePath(templateId);
    if (!templatePath) {
      throw new Req2CodeError(`Template not found: ${templateId}`);
    }

    logger.debug(`[TemplateManager] Loading template "${templateId}" from ${templatePath}`);
    const template = await fs.readFile(templatePath, 'utf-8');
    this.cache.set(templateId, template);
    return template;
  }

  async renderTemplate(templateId: string, context: PromptContext): Promise<string> {
    const template = await this.loadTemplate(templateId);
    return TemplateManager.render(templateId, template, context);
  }

  /**
   * Template ids available from the builtin and custom directories.
   */
  async listTemplates(): Promise<string[]> {
    const ids = new Set<string>(BUILTIN_TEMPLATE_IDS);
    if (this.customPath && (await fs.pathExists(this.customPath))) {
      for (const file of await fs.readdir(this.customPath)) {
        if (file.endsWith('.md')) {
          ids.add(file.slice(0, -'.md'.length));
        }
      }
    }
    return [...ids].sort();
  }

  private async resolveTemplatePath(templateId: string): Promise<string | null> {
    const dirs = this.customPath ? [this.customPath, ...this.builtinDirs] : this.builtinDirs;
    for (const dir of dirs) {
      const candidate = path.join(dir, `${templateId}.md`);
      if (await fs.pathExists(candidate)) {
        return candidate;
      }
    }
    return null;
  }
}
