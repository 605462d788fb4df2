// src/ports.ts
// Slot and widget declarations that make up a node class definition

export type WidgetValue = string | number | boolean;

export type WidgetType = 'INT' | 'FLOAT' | 'STRING' | 'BOOLEAN' | 'COMBO';

export const WIDGET_TYPES: readonly WidgetType[] = ['INT', 'FLOAT', 'STRING', 'BOOLEAN', 'COMBO'];

export interface WidgetSpec {
  name: string;
  type: WidgetType;
  default?: WidgetValue;
  min?: number;
  max?: number;
  /** COMBO choices, in declared order. */
  options?: readonly WidgetValue[];
  multiline?: boolean;
}

export interface InputSlotSpec {
  name: string;
  /** Accepted types; `*` accepts anything. */
  types: readonly string[];
  required: boolean;
}

export interface OutputSlotSpec {
  name: string;
  type: string;
  isList?: boolean;
}

export interface NodeDefinition {
  name: string;
  displayName?: string;
  category?: string;
  description?: string;
  inputs: readonly InputSlotSpec[];
  outputs: readonly OutputSlotSpec[];
  widgets: readonly WidgetSpec[];
}

export function isWidgetType(value: string): value is WidgetType {
  return WIDGET_TYPES.some((t) => t === value);
}

export function findWidget(def: NodeDefinition, name: string): WidgetSpec | undefined {
  return def.widgets.find((w) => w.name === name);
}

export function findInputIndex(def: NodeDefinition, name: string): number {
  return def.inputs.findIndex((i) => i.name === name);
}
