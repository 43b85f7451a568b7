/**
 * Template rendering boundary
 *
 * The engine never interprets template syntax itself; it hands raw text and
 * variables to a TemplateRenderer. The default renderer is nunjucks.
 */

import nunjucks, { type Environment } from "nunjucks";
import type { Variables } from "../types.js";
import { TemplateError } from "../utils/errors.js";

/** Variable holding the resolved application name in every render scope */
export const APP_NAME_VARIABLE = "quadlet_app_name";

export interface TemplateRenderer {
  /**
   * Render `text` with `variables`. `fileName` only identifies the file in
   * errors. Throws TemplateError on syntax errors or undefined variables.
   */
  render(text: string, variables: Variables, fileName: string): string;
}

export interface NunjucksRendererOptions {
  /** Functions and constants available to every template */
  globals?: Record<string, unknown>;
}

export class NunjucksRenderer implements TemplateRenderer {
  private readonly env: Environment;

  constructor(options: NunjucksRendererOptions = {}) {
    this.env = new nunjucks.Environment(null, {
      autoescape: false,
      throwOnUndefined: true,
      trimBlocks: true,
    });
    for (const [name, value] of Object.entries(options.globals ?? {})) {
      this.env.addGlobal(name, value);
    }
  }

  render(text: string, variables: Variables, fileName: string): string {
    try {
      return this.env.renderString(text, variables);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TemplateError(fileName, message.replace(/^\(unknown path\)\s*/, ""), { cause: error });
    }
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode file bytes as UTF-8 and render them with the application name
 * injected into the scope.
 */
export function renderFile(
  renderer: TemplateRenderer,
  bytes: Uint8Array,
  variables: Variables,
  appName: string,
  fileName: string,
): string {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch (error) {
    throw new TemplateError(fileName, "file is not valid UTF-8", { cause: error });
  }
  return renderer.render(text, { ...variables, [APP_NAME_VARIABLE]: appName }, fileName);
}
