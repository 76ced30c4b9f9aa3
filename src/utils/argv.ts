import { ConfigError } from '../errors.js';
import type { ArgvItem, ArgvMode, ArgvOption, ArgvStyle, Scope, Value } from '../types.js';
import { formatItem } from './format.js';
import { evaluateCondition, renderTemplate } from './template.js';
import { isEmpty, stringify } from './value.js';

const TRI_STATE = new Set(['auto', 'true', 'false']);
const MODES: readonly ArgvMode[] = ['auto', 'flag', 'value', 'repeat', 'join'];

export function isArgvOption(item: ArgvItem): item is ArgvOption {
  return typeof item === 'object' && typeof item.opt === 'string';
}

/**
 * Build the argument vector for a run step. Output order follows declaration
 * order; an entry only ever varies how many values it emits.
 */
export function buildArgv(spec: ArgvItem[], scope: Scope): string[] {
  const out: string[] = [];
  for (const item of spec) {
    if (typeof item === 'string') {
      out.push(stringify(renderTemplate(item, scope)));
    } else if (isArgvOption(item)) {
      out.push(...buildOption(item, scope));
    } else {
      const entries = Object.entries(item);
      if (entries.length !== 1) {
        throw new ConfigError(`Unsupported argv item: ${JSON.stringify(item)}`);
      }
      const [opt, valueExpr] = entries[0];
      out.push(...buildShorthand(opt, renderTemplate(valueExpr, scope)));
    }
  }
  return out;
}

export function buildShorthand(opt: string, value: Value): string[] {
  if (value === true) return [opt];
  if (value === false || value === null || value === '') return [];
  if (Array.isArray(value)) return value.flatMap(v => [opt, stringify(v)]);
  return [opt, stringify(value)];
}

export function buildOption(item: ArgvOption, scope: Scope): string[] {
  if (item.when !== undefined && !evaluateCondition(item.when, scope)) return [];

  const opt = item.opt;
  const value = renderTemplate(item.from ?? null, scope);
  const style: ArgvStyle = item.style ?? 'separate';
  const mode = resolveMode(item.mode ?? 'auto', value);

  // "auto" / "true" / "false" strings are flags whatever the declared mode.
  if (typeof value === 'string' && TRI_STATE.has(value)) {
    if (value === 'true') return [opt];
    if (value === 'false' && item.false_opt) return [item.false_opt];
    return [];
  }

  if ((item.omit_if_empty ?? true) && isEmpty(value)) return [];

  switch (mode) {
    case 'flag':
      if (value === true) return [opt];
      if (value === false) return item.false_opt ? [item.false_opt] : [];
      return [];
    case 'value':
      return formatOption(opt, style, renderItem(value, item.template));
    case 'repeat':
      return asList(value).flatMap(entry => formatOption(opt, style, renderItem(entry, item.template)));
    case 'join': {
      const joined = asList(value)
        .map(entry => renderItem(entry, item.template))
        .join(item.joiner ?? ',');
      return formatOption(opt, style, joined);
    }
  }
}

function resolveMode(mode: ArgvMode, value: Value): Exclude<ArgvMode, 'auto'> {
  if (!MODES.includes(mode)) throw new ConfigError(`Unknown argv mode: ${String(mode)}`);
  if (mode !== 'auto') return mode;
  if (typeof value === 'boolean') return 'flag';
  if (Array.isArray(value)) return 'repeat';
  return 'value';
}

function asList(value: Value): Value[] {
  return Array.isArray(value) ? value : [value];
}

function renderItem(value: Value, template: string | undefined): string {
  return template ? formatItem(template, value) : stringify(value);
}

function formatOption(opt: string, style: ArgvStyle, value: string): string[] {
  return style === 'equals' ? [`${opt}=${value}`] : [opt, value];
}
