import type { Bindings } from './types.js';

const PLACEHOLDER = /%\{(\w+)\}/g;

/**
 * Replaces every `%{name}` with the stringified binding. Placeholders without
 * a binding are left as they are.
 *
 * @example
 * interpolate('should be at least %{count} character(s)', { count: 2 })
 * // => 'should be at least 2 character(s)'
 */
export function interpolate(template: string, bindings: Bindings = {}): string {
  return template.replace(PLACEHOLDER, (placeholder: string, name: string) =>
    Object.hasOwn(bindings, name) ? String(bindings[name]) : placeholder,
  );
}
