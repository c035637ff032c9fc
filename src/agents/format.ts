import type { ParameterName, ParameterValue } from '../types.js';

export function formatValue(value: unknown): string {
  if (typeof value === 'number') return Number.isInteger(value) ? String(value) : String(Number(value.toPrecision(6)));
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function humanName(name: ParameterName | string): string {
  return name.replace(/_/g, ' ');
}

export function describeChange(name: ParameterName, previous: ParameterValue, next: ParameterValue): string {
  return `${name}: ${formatValue(previous)} → ${formatValue(next)}`;
}
