/**
 * Parameter Validator
 *
 * Normalizes loosely typed name/value pairs into canonical command arguments.
 * Invalid or unknown input never aborts a call: each rejection is collected
 * as a diagnostic and the remaining pairs are still processed.
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { formatNumber, significant } from './command-builder.js';
import type { Messages } from './messages.js';

export type FieldShape = 'numeric' | 'token';

export interface FieldRule<F extends string = string> {
  name: F;
  /** Lower-case names accepted for this field */
  aliases: readonly string[];
  shape: FieldShape;
  /** Upper-case tokens accepted (token fields only) */
  allowed?: readonly string[];
}

export interface ParamPair<F extends string = string> {
  name: F;
  value: string;
}

export interface ParameterSet<F extends string = string> {
  params: ParamPair<F>[];
  diagnostics: string[];
}

export interface ParamValidatorConfig<F extends string> {
  fields: readonly FieldRule<F>[];
  /** Per-command output subsets, in output order */
  commands?: Record<string, readonly F[]>;
  messages: Messages;
}

export interface ParamValidator<F extends string> {
  check(inputs: readonly unknown[], command?: string): ParameterSet<F>;
  /** Value of one field from a checked set, or undefined when absent */
  get(set: ParameterSet<F>, name: F): string | undefined;
}

const SHAPES: Record<FieldShape, RegExp> = {
  numeric: /^[\w.+-]+$/,
  token: /^\w+$/,
};

const VALUE_DISPLAY_MAX = 44;
const VALUE_DISPLAY_CUT = 40;

function isStringArray(value: readonly unknown[]): value is readonly string[] {
  return value.every(v => typeof v === 'string');
}

function isScalarArray(value: readonly unknown[]): value is readonly (number | boolean)[] {
  return value.every(v => typeof v === 'number' || typeof v === 'boolean');
}

function scalarText(value: number | boolean): string {
  if (typeof value === 'boolean') return value ? '1' : '0';
  return formatNumber(value, significant(10));
}

/**
 * Coerce a caller value into its canonical text form.
 *
 * - 'on'            -> 'ON'
 * - ['a', 'b']      -> 'A, B'
 * - true            -> '1'
 * - 0.15            -> '0.15'
 * - [1, 2]          -> '1, 2'
 */
export function coerceValue(value: unknown): Result<string, string> {
  if (typeof value === 'string') {
    return value === '' ? Err('empty value') : Ok(value.toUpperCase());
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return Ok(scalarText(value).toUpperCase());
  }
  if (Array.isArray(value) && value.length > 0) {
    const items: readonly unknown[] = value;
    if (isStringArray(items)) return Ok(items.join(', ').toUpperCase());
    if (isScalarArray(items)) return Ok(items.map(scalarText).join(', ').toUpperCase());
  }
  return Err('invalid type');
}

function nameText(name: unknown): string | null {
  if (typeof name === 'string') return name;
  if (Array.isArray(name) && name.length > 0 && isStringArray(name)) return name.join('');
  return null;
}

export function createParamValidator<F extends string>(
  config: ParamValidatorConfig<F>
): ParamValidator<F> {
  const { fields, commands = {}, messages } = config;

  const aliasIndex = new Map<string, FieldRule<F>>();
  for (const field of fields) {
    for (const alias of field.aliases) {
      aliasIndex.set(alias, field);
    }
  }

  function lookup(name: unknown): Result<FieldRule<F>, string> {
    const text = nameText(name);
    if (text === null) {
      return Err('parameter names have to be strings');
    }
    const field = aliasIndex.get(text.toLowerCase());
    return field ? Ok(field) : Err(`parameter name '${text}' is unknown`);
  }

  function validate(field: FieldRule<F>, raw: unknown): Result<string, string> {
    const coerced = coerceValue(raw);
    if (!coerced.ok) return coerced;
    const value = coerced.value;
    if (!SHAPES[field.shape].test(value)) {
      return Err(`invalid value '${value}' for '${field.name}'`);
    }
    if (field.allowed && !field.allowed.includes(value)) {
      return Err(`invalid value '${value}' for '${field.name}', valid values are: ${field.allowed.join(', ')}`);
    }
    return Ok(value);
  }

  return {
    check(inputs: readonly unknown[], command?: string): ParameterSet<F> {
      const diagnostics: string[] = [];
      const reject = (reason: string) => {
        diagnostics.push(reason);
        messages.warn(`${reason}. Ignore input.`);
      };

      if (inputs.length % 2 !== 0) {
        reject('odd number of parameters, last one dropped');
      }

      const values = new Map<F, string>();
      for (let i = 1; i < inputs.length; i += 2) {
        const field = lookup(inputs[i - 1]);
        if (!field.ok) {
          reject(field.error);
          continue;
        }

        const value = validate(field.value, inputs[i]);
        if (value.ok) {
          values.set(field.value.name, value.value);
        } else {
          reject(value.error);
        }
      }

      const order = (command !== undefined ? commands[command] : undefined) ?? fields.map(f => f.name);
      const params: ParamPair<F>[] = [];
      for (const name of order) {
        const value = values.get(name);
        if (value !== undefined) params.push({ name, value });
      }

      if (messages.level === 'all') {
        for (const line of formatParams({ params, diagnostics })) messages.all(line);
      }

      return { params, diagnostics };
    },

    get(set: ParameterSet<F>, name: F): string | undefined {
      return set.params.find(p => p.name === name)?.value;
    },
  };
}

/**
 * Display lines for a checked parameter set.
 */
export function formatParams<F extends string>(set: ParameterSet<F>): string[] {
  return set.params.map(({ name, value }) => {
    const text = value.length > VALUE_DISPLAY_MAX ? `${value.slice(0, VALUE_DISPLAY_CUT)} ...` : value;
    return `  - ${name.padEnd(13)}: ${text}`;
  });
}
