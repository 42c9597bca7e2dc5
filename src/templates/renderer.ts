/**
 * Snippet rendering: the second-level mini-templates referenced by
 * descriptor leaves.
 *
 * Two constructs only:
 *   {{name}}                     variable substitution
 *   {{#flag}}...{{/flag}}        included when the flag is true
 *   {{^flag}}...{{/flag}}        included when the flag is false
 * A section tag directly followed by a newline swallows that newline, so
 * sections can sit on their own lines without leaving blank ones behind.
 */

import { readdirSync, readFileSync, existsSync } from 'fs';
import { basename, join } from 'path';
import { GenerationError } from '../core/errors.js';
import { isFlagName, type TemplateScope } from './scope.js';

const SECTION_RE = /\{\{([#^])(\w+)\}\}\n?([\s\S]*?)\{\{\/\2\}\}\n?/g;
const VARIABLE_RE = /\{\{(\w+)\}\}/g;
const SECTION_TAG_RE = /\{\{[#^/](\w+)\}\}/g;
const PATH_PLACEHOLDER_RE = /\{(\w+)\}/g;

/**
 * Throw on the first variable or section flag the scope cannot resolve.
 * Runs eagerly during expansion so that rendering itself can stay lazy.
 */
export function assertResolvable(text: string, scope: TemplateScope, path: string): void {
  for (const match of text.matchAll(SECTION_TAG_RE)) {
    if (!isFlagName(match[1])) {
      throw new GenerationError(`Unknown flag "${match[1]}" in section of ${path}`, path, match[1]);
    }
  }
  const withoutSections = text.replace(SECTION_TAG_RE, '');
  for (const match of withoutSections.matchAll(VARIABLE_RE)) {
    if (!(match[1] in scope.vars)) {
      throw new GenerationError(`Unresolved placeholder "{{${match[1]}}}" in ${path}`, path, match[1]);
    }
  }
}

export function renderSnippet(text: string, scope: TemplateScope, path: string): string {
  let output = text;
  let previous: string;
  // Repeat so that sections nested inside other sections are resolved too
  do {
    previous = output;
    output = output.replace(SECTION_RE, (_, mode: string, flag: string, body: string) => {
      if (!isFlagName(flag)) {
        throw new GenerationError(`Unknown flag "${flag}" in section of ${path}`, path, flag);
      }
      const on = scope.flags[flag];
      return (mode === '#' ? on : !on) ? body : '';
    });
  } while (output !== previous);

  return output.replace(VARIABLE_RE, (_, name: string) => {
    const value = scope.vars[name];
    if (value === undefined) {
      throw new GenerationError(`Unresolved placeholder "{{${name}}}" in ${path}`, path, name);
    }
    return value;
  });
}

/**
 * Substitute `{name}` placeholders in one path segment. Returns whether any
 * substitution happened so callers can apply identifier rules to it.
 */
export function resolveSegment(
  segment: string,
  scope: TemplateScope,
  rawPath: string,
): { value: string; substituted: boolean } {
  let substituted = false;
  const value = segment.replace(PATH_PLACEHOLDER_RE, (_, name: string) => {
    const replacement = scope.vars[name];
    if (replacement === undefined) {
      throw new GenerationError(`Unresolved placeholder "{${name}}" in path ${rawPath}`, rawPath, name);
    }
    substituted = true;
    return replacement;
  });
  return { value, substituted };
}

/** Named snippet texts, usually loaded from descriptors/snippets/*.tmpl */
export class SnippetStore {
  private snippets = new Map<string, string>();

  /** Add every *.tmpl in a directory; a later file replaces an earlier snippet of the same name */
  loadDirectory(dir: string): void {
    if (!existsSync(dir)) return;
    for (const file of readdirSync(dir).sort()) {
      if (!file.endsWith('.tmpl')) continue;
      this.register(basename(file, '.tmpl'), readFileSync(join(dir, file), 'utf-8'));
    }
  }

  register(name: string, text: string): void {
    this.snippets.set(name, text);
  }

  has(name: string): boolean {
    return this.snippets.has(name);
  }

  get(name: string): string | undefined {
    return this.snippets.get(name);
  }

  names(): string[] {
    return [...this.snippets.keys()];
  }
}
