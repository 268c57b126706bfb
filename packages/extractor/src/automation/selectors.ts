const SIMPLE_TOKEN = /^([#.])([\w-]+)$/;

/**
 * Translate a configured selector into a CSS selector.
 *
 * A lone `#name` matches the element whose id is exactly `name` and a lone
 * `.name` an element carrying the class `name`. Anything else, compound
 * selectors such as `#player video` included, is passed through as CSS.
 */
export function toCssSelector(selector: string): string {
  const trimmed = selector.trim();
  const match = SIMPLE_TOKEN.exec(trimmed);
  if (!match) {
    return trimmed;
  }
  const [, prefix, name] = match;
  return prefix === '#' ? `[id="${name}"]` : `[class~="${name}"]`;
}
