/**
 * HTML error page template
 *
 * Loaded once at startup. The stylesheet and logo are baked in at load time,
 * so rendering a page is a single pass of literal token substitution with no
 * filesystem access.
 */

import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors/faultpage-error.js';

export interface TemplateValues {
  title: string;
  errorCode: string;
  errorMessage: string;
  stackTrace: string;
}

export interface TemplateAssets {
  stylesheet?: string;
  logo?: string;
}

export const TEMPLATE_FILES = {
  page: 'error.html',
  stylesheet: path.join('css', 'main.css'),
  logo: path.join('images', 'logo.svg'),
} as const;

const PLACEHOLDER = /\{(title|errorCode|errorMessage|stackTrace)\}/g;

export class ErrorTemplate {
  private constructor(private readonly source: string) {}

  static fromSource(source: string, assets: TemplateAssets = {}): ErrorTemplate {
    return new ErrorTemplate(
      source
        .split('{stylesheet}').join(assets.stylesheet ?? '')
        .split('{logo}').join(assets.logo ?? '')
    );
  }

  /**
   * Read the page, stylesheet and logo from `assetsDir`.
   * Throws ConfigurationError when any of them is missing.
   */
  static load(assetsDir: string): ErrorTemplate {
    const read = (file: string): string => {
      const fullPath = path.join(assetsDir, file);
      try {
        return fs.readFileSync(fullPath, 'utf-8');
      } catch (err) {
        throw new ConfigurationError(`Unable to read error page asset ${fullPath}: ${err instanceof Error ? err.message : String(err)}`, {
          assetsDir,
          file,
        });
      }
    };

    return ErrorTemplate.fromSource(read(TEMPLATE_FILES.page), {
      stylesheet: read(TEMPLATE_FILES.stylesheet),
      logo: read(TEMPLATE_FILES.logo),
    });
  }

  render(values: TemplateValues): string {
    return this.source.replace(PLACEHOLDER, (_match, key: keyof TemplateValues) => values[key]);
  }
}
