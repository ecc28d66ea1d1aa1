/**
 * Template Classifier
 *
 * Decides whether a template is a helper (a generated utility routine) or
 * main mapping logic, purely from its name and the configured patterns.
 */

import type { TemplateKind } from './types.js';

const MATCH_PREFIX = 'match:';

/**
 * Classify a template by name.
 *
 * A `match:` prefix is removed first, then each pattern is searched for
 * anywhere in the name; any hit makes the template a helper. Unnamed
 * templates are main templates.
 *
 * @example
 * ```ts
 * classifyTemplate('vmf:vmf3_inputtoresult', [/(?:vmf:)?vmf\d+/]); // 'helper_template'
 * classifyTemplate('match:/', [/(?:vmf:)?vmf\d+/]);                // 'main_template'
 * ```
 */
export function classifyTemplate(
  name: string | null,
  helperPatterns: readonly RegExp[]
): TemplateKind {
  if (name === null) {
    return 'main_template';
  }

  const bare = name.startsWith(MATCH_PREFIX) ? name.slice(MATCH_PREFIX.length) : name;
  return helperPatterns.some((pattern) => pattern.test(bare)) ? 'helper_template' : 'main_template';
}

/**
 * Compile helper pattern sources. Throws SyntaxError for an invalid one;
 * settings resolution turns that into a ConfigError.
 */
export function compileHelperPatterns(sources: readonly string[]): RegExp[] {
  // No flags: a global regex would make test() stateful
  return sources.map((source) => new RegExp(source));
}
