/**
 * SCPI Command Builder
 *
 * Maps a named operation and a typed value to a single command line
 * (no terminator; that belongs to the transport).
 */

export type NumberFormat =
  | { kind: 'fixed'; decimals: number }
  | { kind: 'significant'; digits: number };

export const fixed = (decimals: number): NumberFormat => ({ kind: 'fixed', decimals });
export const significant = (digits: number): NumberFormat => ({ kind: 'significant', digits });

export interface CommandTemplate {
  name: string;
  /** Command with a {value} placeholder, e.g. 'SOUR:CURR {value}' */
  template: string;
  /** Readback query, e.g. 'SOUR:CURR?' */
  query?: string;
  /** Caller units to device units (mA -> A is 0.001) */
  unitScale: number;
  /** Allowed range in caller units */
  range?: readonly [min: number, max: number];
  format: NumberFormat;
}

export interface BuiltCommand {
  command: string;
  /** Value after clipping, in caller units */
  value: number;
  /** Value as transmitted, in device units */
  sent: number;
  clipped: boolean;
}

export type BoolDialect = 'ON/OFF' | '1/0';

export function clip(value: number, range?: readonly [number, number]): number {
  if (!range) return value;
  return Math.min(Math.max(value, range[0]), range[1]);
}

/**
 * Format a number for the wire.
 *
 * fixed(6):        0.15      -> "0.150000"
 * significant(10): 1e-11     -> "1E-11", 0.1 + 0.2 -> "0.3"
 */
export function formatNumber(value: number, format: NumberFormat): string {
  if (format.kind === 'fixed') {
    return value.toFixed(format.decimals);
  }
  // Round-trip through Number drops trailing zeros of toPrecision
  return String(Number(value.toPrecision(format.digits))).toUpperCase();
}

function fill(template: string, value: string): string {
  return template.replace('{value}', value);
}

/**
 * Build a numeric set command: clip, scale, format.
 */
export function buildCommand(setting: CommandTemplate, value: number): BuiltCommand {
  const clipped = clip(value, setting.range);
  // Divide rather than multiply for sub-unit scales: 150 / 1000 is exact where 150 * 0.001 is not
  const sent = setting.unitScale < 1 ? clipped / (1 / setting.unitScale) : clipped * setting.unitScale;

  return {
    command: fill(setting.template, formatNumber(sent, setting.format)),
    value: clipped,
    sent,
    clipped: clipped !== value,
  };
}

export function buildBoolCommand(template: string, value: boolean, dialect: BoolDialect): string {
  const token = dialect === 'ON/OFF' ? (value ? 'ON' : 'OFF') : (value ? '1' : '0');
  return fill(template, token);
}

export function buildTokenCommand(template: string, token: string): string {
  return fill(template, token);
}

/** Convert a device-unit readback to caller units */
export function toCallerUnits(setting: CommandTemplate, deviceValue: number): number {
  return setting.unitScale < 1 ? deviceValue * (1 / setting.unitScale) : deviceValue / setting.unitScale;
}
