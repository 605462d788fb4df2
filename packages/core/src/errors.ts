// src/errors.ts
// Structured error classes shared by the codec, catalog, compiler and executor

import type { OperationKind } from './operations.js';

export type ViolationRule =
  | 'unknown_class'
  | 'unknown_node'
  | 'duplicate_node'
  | 'invalid_node_id'
  | 'slot_out_of_range'
  | 'type_mismatch'
  | 'duplicate_link'
  | 'input_occupied'
  | 'missing_link'
  | 'cycle'
  | 'unknown_widget'
  | 'invalid_widget_value'
  | 'missing_widget_value'
  | 'malformed_brief'
  | 'unresolved_reference'
  | 'ambiguous_reference'
  | 'malformed_input'
  | 'malformed_catalog';

export type ErrorKind = 'format' | 'compile' | 'execution' | 'catalog';

/** A single rule violation, before it is attached to a call site. */
export interface Violation {
  rule: ViolationRule;
  field: string;
  message: string;
}

export interface ValidationError {
  path: string;
  rule: ViolationRule;
  message: string;
}

export interface SerializedError {
  kind: ErrorKind;
  rule: ViolationRule;
  message: string;
  field?: string;
  index?: number;
  operation?: OperationKind;
  className?: string;
  details?: ValidationError[];
}

export abstract class NodepatchError extends Error {
  abstract readonly kind: ErrorKind;
  readonly rule: ViolationRule;
  readonly field?: string;

  constructor(rule: ViolationRule, message: string, field?: string) {
    super(message);
    this.rule = rule;
    this.field = field;
  }

  toJSON(): SerializedError {
    const out: SerializedError = { kind: this.kind, rule: this.rule, message: this.message };
    if (this.field !== undefined) out.field = this.field;
    return out;
  }
}

export class FormatError extends NodepatchError {
  readonly kind = 'format';
  readonly details?: ValidationError[];

  constructor(rule: ViolationRule, message: string, field?: string, details?: ValidationError[]) {
    super(rule, message, field);
    this.name = 'FormatError';
    this.details = details;
  }

  static fromValidation(errors: ValidationError[]): FormatError {
    const [first] = errors;
    if (!first) {
      return new FormatError('malformed_input', 'Graph is invalid');
    }
    const more = errors.length > 1 ? ` (+${errors.length - 1} more)` : '';
    return new FormatError(first.rule, `${first.path}: ${first.message}${more}`, first.path, errors);
  }

  override toJSON(): SerializedError {
    const out = super.toJSON();
    if (this.details) out.details = this.details;
    return out;
  }
}

export class CompileError extends NodepatchError {
  readonly kind = 'compile';
  readonly index?: number;
  readonly operation?: OperationKind;

  constructor(
    rule: ViolationRule,
    message: string,
    opts: { field?: string; index?: number; operation?: OperationKind } = {},
  ) {
    const where = opts.index !== undefined ? `Operation ${opts.index} (${opts.operation}): ` : '';
    super(rule, `${where}${message}`, opts.field);
    this.name = 'CompileError';
    this.index = opts.index;
    this.operation = opts.operation;
  }

  override toJSON(): SerializedError {
    const out = super.toJSON();
    if (this.index !== undefined) out.index = this.index;
    if (this.operation !== undefined) out.operation = this.operation;
    return out;
  }
}

export class ExecutionError extends NodepatchError {
  readonly kind = 'execution';
  readonly index: number;
  readonly operation: OperationKind;

  constructor(index: number, operation: OperationKind, violation: Violation) {
    super(violation.rule, `Operation ${index} (${operation}): ${violation.message}`, violation.field);
    this.name = 'ExecutionError';
    this.index = index;
    this.operation = operation;
  }

  override toJSON(): SerializedError {
    return { ...super.toJSON(), index: this.index, operation: this.operation };
  }
}

export class CatalogError extends NodepatchError {
  readonly kind = 'catalog';
  readonly className?: string;

  constructor(message: string, opts: { className?: string; field?: string; rule?: ViolationRule } = {}) {
    super(opts.rule ?? 'malformed_catalog', message, opts.field);
    this.name = 'CatalogError';
    this.className = opts.className;
  }

  override toJSON(): SerializedError {
    const out = super.toJSON();
    if (this.className !== undefined) out.className = this.className;
    return out;
  }
}
