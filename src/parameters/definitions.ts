import { z } from 'zod';
import type { GridName, ParameterName, ParameterSet, Result } from '../types.js';

export type GridPreset = { buses: number; reactance: number };

// Thevenin reactance (pu on 100 MVA) seen from a typical load bus of each test system.
export const GRID_PRESETS: Record<GridName, GridPreset> = {
  ieee14: { buses: 14, reactance: 0.25 },
  ieee24: { buses: 24, reactance: 0.2 },
  ieee30: { buses: 30, reactance: 0.22 },
  ieee39: { buses: 39, reactance: 0.145 },
  ieee57: { buses: 57, reactance: 0.18 },
  ieee118: { buses: 118, reactance: 0.12 },
  ieee300: { buses: 300, reactance: 0.1 }
};

const GRID_NAMES: [GridName, ...GridName[]] = ['ieee14', 'ieee24', 'ieee30', 'ieee39', 'ieee57', 'ieee118', 'ieee300'];

export const DEFAULT_PARAMETERS: Readonly<ParameterSet> = Object.freeze({
  grid: 'ieee39',
  monitored_bus: 5,
  base_power: 100,
  step_size: 0.01,
  max_scale: 3,
  power_factor: 0.95,
  voltage_limit: 0.4,
  load_type: 'inductive',
  continuation: true
});

export interface ParameterDefinition<K extends ParameterName> {
  name: K;
  description: string;
  domain: string;
  unit?: string;
  aliases: string[];
  parse(raw: unknown): Result<ParameterSet[K], string>;
}

type ParameterDefinitions = { [K in ParameterName]: ParameterDefinition<K> };

function fromSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (raw: unknown): Result<T, string> => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) return { ok: true, value: parsed.data };
    return { ok: false, error: parsed.error.issues[0]?.message ?? 'invalid value' };
  };
}

const numeric = (schema: z.ZodNumber) =>
  z.preprocess(v => (typeof v === 'string' && v.trim() !== '' && !Number.isNaN(Number(v)) ? Number(v) : v), schema);

const num = () => z.number({ invalid_type_error: 'must be a number', required_error: 'must be a number' }).finite('must be finite');

const choice = <T extends string>(values: [T, ...T[]]) =>
  z.preprocess(
    v => (typeof v === 'string' ? v.trim().toLowerCase() : v),
    z.enum(values, { errorMap: () => ({ message: `must be one of ${values.join(', ')}` }) })
  );

const flag = z.preprocess(v => {
  if (typeof v !== 'string') return v;
  const t = v.trim().toLowerCase();
  if (['true', 'yes', 'on', '1'].includes(t)) return true;
  if (['false', 'no', 'off', '0'].includes(t)) return false;
  return v;
}, z.boolean({ invalid_type_error: 'must be true or false', required_error: 'must be true or false' }));

export const PARAMETER_DEFINITIONS: ParameterDefinitions = {
  grid: {
    name: 'grid',
    description: 'IEEE test system the Thevenin equivalent is taken from',
    domain: `one of ${GRID_NAMES.join(', ')}`,
    aliases: ['grid', 'test system', 'test case'],
    parse: fromSchema(choice(GRID_NAMES))
  },
  monitored_bus: {
    name: 'monitored_bus',
    description: 'bus whose voltage is tracked along the curve',
    domain: 'a whole number from 1 to the bus count of the grid',
    aliases: ['monitored bus', 'target bus', 'bus id', 'bus number', 'bus'],
    parse: fromSchema(numeric(num().int('must be a whole number').min(1, 'must be at least 1')))
  },
  base_power: {
    name: 'base_power',
    description: 'active load at the monitored bus before scaling',
    domain: 'at least 0',
    unit: 'MW',
    aliases: ['base power', 'base load', 'initial load'],
    parse: fromSchema(numeric(num().min(0, 'must be at least 0')))
  },
  step_size: {
    name: 'step_size',
    description: 'load-scale increment between two curve points',
    domain: 'at least 0.001 and at most 1',
    aliases: ['step size', 'increment'],
    parse: fromSchema(numeric(num().min(0.001, 'must be at least 0.001').max(1, 'must be at most 1')))
  },
  max_scale: {
    name: 'max_scale',
    description: 'largest load multiplier the sweep may reach',
    domain: 'greater than 1 and at most 10',
    aliases: ['max scale', 'maximum scale', 'max load scale'],
    parse: fromSchema(numeric(num().gt(1, 'must be greater than 1').max(10, 'must be at most 10')))
  },
  power_factor: {
    name: 'power_factor',
    description: 'load power factor used to derive reactive power',
    domain: 'greater than 0 and at most 1',
    aliases: ['power factor', 'pf'],
    parse: fromSchema(numeric(num().gt(0, 'must be greater than 0').max(1, 'must be at most 1')))
  },
  voltage_limit: {
    name: 'voltage_limit',
    description: 'voltage below which the sweep stops',
    domain: 'at least 0 and below 1',
    unit: 'pu',
    aliases: ['voltage limit', 'minimum voltage', 'v limit', 'voltage threshold'],
    parse: fromSchema(numeric(num().min(0, 'must be at least 0').lt(1, 'must be below 1')))
  },
  load_type: {
    name: 'load_type',
    description: 'whether the load draws (inductive) or injects (capacitive) reactive power',
    domain: 'inductive or capacitive',
    aliases: ['load type', 'load kind'],
    parse: fromSchema(choice<'inductive' | 'capacitive'>(['inductive', 'capacitive']))
  },
  continuation: {
    name: 'continuation',
    description: 'whether the curve continues along the lower branch past the nose',
    domain: 'true or false',
    aliases: ['continuation', 'lower branch', 'continuation curve'],
    parse: fromSchema(flag)
  }
};

export const PARAMETER_NAMES: readonly ParameterName[] = [
  'grid', 'monitored_bus', 'base_power', 'step_size', 'max_scale',
  'power_factor', 'voltage_limit', 'load_type', 'continuation'
];

export function isParameterName(name: string): name is ParameterName {
  return Object.prototype.hasOwnProperty.call(PARAMETER_DEFINITIONS, name);
}
