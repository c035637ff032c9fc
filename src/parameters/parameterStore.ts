import { InvalidParameterError, UnknownParameterError, type ParameterError } from '../errors.js';
import type { ParameterName, ParameterSet, ParameterValue, Result } from '../types.js';
import {
  DEFAULT_PARAMETERS,
  GRID_PRESETS,
  PARAMETER_DEFINITIONS,
  PARAMETER_NAMES,
  isParameterName,
  type ParameterDefinition
} from './definitions.js';

function normalizeAlias(text: string): string {
  return text.trim().toLowerCase().replace(/[\s-]+/g, ' ');
}

function parseInto<K extends ParameterName>(target: ParameterSet, def: ParameterDefinition<K>, raw: unknown): string | null {
  const parsed = def.parse(raw);
  if (!parsed.ok) return parsed.error;
  target[def.name] = parsed.value;
  return null;
}

/**
 * Versioned, validated parameter set. Every mutation goes through `apply` or
 * `resetToDefault`; a batch with any invalid entry changes nothing.
 */
export class ParameterStore {
  private values: ParameterSet;
  private _version: number;

  constructor(initial: Readonly<ParameterSet> = DEFAULT_PARAMETERS, version = 0) {
    this.values = { ...initial };
    this._version = version;
  }

  get version(): number {
    return this._version;
  }

  getAll(): Readonly<ParameterSet> {
    return Object.freeze({ ...this.values });
  }

  validate(name: string, value: unknown): Result<ParameterValue, ParameterError> {
    if (!isParameterName(name)) return { ok: false, error: new UnknownParameterError(name, PARAMETER_NAMES) };
    const parsed = PARAMETER_DEFINITIONS[name].parse(value);
    if (!parsed.ok) return { ok: false, error: new InvalidParameterError(name, value, parsed.error) };
    return { ok: true, value: parsed.value };
  }

  apply(deltas: Readonly<Record<string, unknown>>): Result<Readonly<ParameterSet>, ParameterError> {
    const next: ParameterSet = { ...this.values };
    for (const [name, raw] of Object.entries(deltas)) {
      if (!isParameterName(name)) return { ok: false, error: new UnknownParameterError(name, PARAMETER_NAMES) };
      const reason = parseInto(next, PARAMETER_DEFINITIONS[name], raw);
      if (reason) return { ok: false, error: new InvalidParameterError(name, raw, reason) };
    }

    // bus range depends on the grid, so it is checked on the merged set
    const { buses } = GRID_PRESETS[next.grid];
    if (next.monitored_bus > buses) {
      return {
        ok: false,
        error: new InvalidParameterError('monitored_bus', next.monitored_bus, `must be between 1 and ${buses} for ${next.grid}`)
      };
    }

    if (PARAMETER_NAMES.some(n => next[n] !== this.values[n])) {
      this.values = next;
      this._version += 1;
    }
    return { ok: true, value: this.getAll() };
  }

  resetToDefault(): Readonly<ParameterSet> {
    this.values = { ...DEFAULT_PARAMETERS };
    this._version += 1;
    return this.getAll();
  }

  /** Maps free-text names ("step size", "PF", "monitored-bus") to a parameter name. */
  static resolveName(text: string): ParameterName | null {
    const alias = normalizeAlias(text);
    const snake = alias.replace(/ /g, '_');
    if (isParameterName(snake)) return snake;
    for (const name of PARAMETER_NAMES) {
      if (PARAMETER_DEFINITIONS[name].aliases.includes(alias)) return name;
    }
    return null;
  }

  /** Longest alias mentioned anywhere in `text`, if any. */
  static findMentioned(text: string): ParameterName | null {
    const haystack = ` ${normalizeAlias(text).replace(/[^a-z0-9_ ]/g, ' ')} `;
    let best: { name: ParameterName; length: number } | null = null;
    for (const name of PARAMETER_NAMES) {
      for (const alias of [name, ...PARAMETER_DEFINITIONS[name].aliases]) {
        if (haystack.includes(` ${alias} `) && (!best || alias.length > best.length)) {
          best = { name, length: alias.length };
        }
      }
    }
    return best?.name ?? null;
  }

  static describe(name: ParameterName): string {
    const def = PARAMETER_DEFINITIONS[name];
    return `${name}: ${def.description} (${def.domain}${def.unit ? `, in ${def.unit}` : ''})`;
  }
}
