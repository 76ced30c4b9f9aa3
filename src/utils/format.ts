import { EvaluationError } from '../errors.js';
import type { Value } from '../types.js';
import { isMap, stringify } from './value.js';

const FIELD_RE = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;

/**
 * Format one argv item through a brace template: `{}` and `{0}` take the
 * item itself, `{value}` a scalar item, `{name}` a field of a map item.
 * `{{` and `}}` are literal braces.
 */
export function formatItem(template: string, item: Value): string {
  return template.replace(FIELD_RE, (match: string, field: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    if (field === undefined) throw new EvaluationError(`Unbalanced brace in argv template: ${template}`);
    const key = field.trim();
    if (key === '' || key === '0') return stringify(item);
    if (isMap(item)) {
      if (!Object.hasOwn(item, key)) {
        throw new EvaluationError(`argv template field '${key}' is missing from item ${stringify(item)}`);
      }
      return stringify(item[key]);
    }
    if (key === 'value') return stringify(item);
    throw new EvaluationError(`argv template field '${key}' needs a map item, got ${stringify(item)}`);
  });
}
