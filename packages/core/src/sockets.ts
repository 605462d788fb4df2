// src/sockets.ts
// Slot type compatibility and widget value checks

import type { InputSlotSpec, OutputSlotSpec, WidgetSpec } from './ports.js';

export const ANY_TYPE = '*';

/**
 * Split a declared slot type into its accepted parts: `"IMAGE,MASK"` -> `['IMAGE', 'MASK']`.
 * An empty declaration accepts anything.
 */
export function parseSlotTypes(declared: string): string[] {
  const parts = declared
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  return parts.length > 0 ? parts : [ANY_TYPE];
}

/**
 * Link-level compatibility rule: wildcard on either side, otherwise the
 * produced type must be one of the accepted types.
 */
export function areSlotTypesCompatible(output: OutputSlotSpec, input: InputSlotSpec): boolean {
  if (output.type === ANY_TYPE) return true;
  if (input.types.includes(ANY_TYPE)) return true;
  const produced = parseSlotTypes(output.type);
  return produced.some((t) => t === ANY_TYPE || input.types.includes(t));
}

export function formatSlotTypes(input: InputSlotSpec): string {
  return input.types.join(',');
}

/**
 * Check a widget value against its declaration.
 * Returns a message describing the problem, or null when the value fits.
 */
export function checkWidgetValue(spec: WidgetSpec, value: unknown): string | null {
  switch (spec.type) {
    case 'INT':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        return `expected an integer, got ${describeValue(value)}`;
      }
      return checkRange(spec, value);
    case 'FLOAT':
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return `expected a finite number, got ${describeValue(value)}`;
      }
      return checkRange(spec, value);
    case 'STRING':
      return typeof value === 'string' ? null : `expected a string, got ${describeValue(value)}`;
    case 'BOOLEAN':
      return typeof value === 'boolean' ? null : `expected a boolean, got ${describeValue(value)}`;
    case 'COMBO': {
      const options = spec.options ?? [];
      if (options.some((o) => o === value)) return null;
      const shown = options.slice(0, 8).map((o) => JSON.stringify(o)).join(', ');
      const more = options.length > 8 ? ', …' : '';
      return `${describeValue(value)} is not one of [${shown}${more}]`;
    }
  }
}

function checkRange(spec: WidgetSpec, value: number): string | null {
  if (spec.min !== undefined && value < spec.min) {
    return `${value} is below the minimum ${spec.min}`;
  }
  if (spec.max !== undefined && value > spec.max) {
    return `${value} is above the maximum ${spec.max}`;
  }
  return null;
}

function describeValue(value: unknown): string {
  if (value === undefined) return 'nothing';
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return typeof value;
}
