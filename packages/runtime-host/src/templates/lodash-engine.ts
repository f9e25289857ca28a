/**
 * Rigger Runtime Host — lodash Template Engine
 *
 * TemplateEngine over `lodash.template`. Templates use lodash syntax:
 *
 *   <%= config.nginx.port %>   interpolate
 *   <%- config.motd %>         interpolate, HTML-escaped
 *   <% if (config.tls) { %>    evaluate
 *
 * ES `${...}` delimiters are switched off so shell and systemd files, which
 * use that syntax themselves, pass through untouched.
 *
 * Compiled templates are cached by source text.
 */

import lodash from 'lodash';
import type { TemplateEngine } from '@rigger/kernel';

type CompiledTemplate = (data?: object) => string;

/**
 * lodash only honours `${...}` while `interpolate` is its own default regex
 * object; an equal pattern in a new object switches it off.
 */
const INTERPOLATE = /<%=([\s\S]+?)%>/g;

export class LodashTemplateEngine implements TemplateEngine {
  private readonly cache: Map<string, CompiledTemplate> = new Map();

  render(source: string, variables: Readonly<Record<string, unknown>>): string {
    return this.compile(source)({ ...variables });
  }

  private compile(source: string): CompiledTemplate {
    const cached = this.cache.get(source);
    if (cached !== undefined) return cached;
    const compiled = lodash.template(source, { interpolate: INTERPOLATE });
    this.cache.set(source, compiled);
    return compiled;
  }
}
