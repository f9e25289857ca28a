/**
 * Rigger Kernel — Template
 *
 * A Template is bound to the context that created it. Rendering exposes the
 * context configuration as the `config` variable, next to any variables the
 * caller passes (caller variables win on a name clash). The substitution
 * syntax belongs to the injected TemplateEngine.
 *
 * renderToTempfile() names the output after the SHA-1 of the rendered bytes,
 * so identical renders land in the same file and a changed render never
 * reuses a stale one.
 */

import { createHash } from 'node:crypto';
import type { ExecutionContext } from '../context/execution-context.js';

export interface TemplateOptions {
  /**
   * When the path does not name an existing file, treat the string itself
   * as the template text instead of failing.
   */
  readonly inlineFallback?: boolean | undefined;
}

export const TEMPLATE_TEMPFILE_PREFIX = 'rigger-tpl-';

export class Template {
  private readonly inlineFallback: boolean;

  constructor(
    private readonly context: ExecutionContext,
    readonly path: string,
    options: TemplateOptions = {},
  ) {
    this.inlineFallback = options.inlineFallback ?? false;
  }

  /** The template text, read from `path` unless inline fallback applies. */
  async source(): Promise<string> {
    return (await this.load()).text;
  }

  async render(variables: Readonly<Record<string, unknown>> = {}): Promise<string> {
    const { text, inline } = await this.load();
    this.context.log(`RENDER: ${inline ? '(inline template)' : this.path}`);
    return this.context.templates.render(text, {
      config: this.context.config.toJSON(),
      ...variables,
    });
  }

  /** Render and write the result to a temp file; answers the file path. */
  async renderToTempfile(variables: Readonly<Record<string, unknown>> = {}): Promise<string> {
    const content = new TextEncoder().encode(await this.render(variables));
    const digest = createHash('sha1').update(content).digest('hex');
    return this.context.host.writeTempFile(`${TEMPLATE_TEMPFILE_PREFIX}${digest}`, content);
  }

  private async load(): Promise<{ text: string; inline: boolean }> {
    if (this.inlineFallback && !(await this.context.host.exists(this.path))) {
      return { text: this.path, inline: true };
    }
    const bytes = await this.context.host.readFile(this.path);
    return { text: new TextDecoder('utf-8').decode(bytes), inline: false };
  }
}
