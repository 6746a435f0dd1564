/**
 * Keithley 2450 source and sense parameter tables
 *
 * Each field maps to a typed accessor (get, optional set, display text).
 * The driver dispatches by field name through these tables and builds its
 * parameter validators from them.
 */

import type { Transport } from '../types.js';
import { SetStatus } from '../../../shared/types.js';
import { ScpiParser, UNEXPECTED_RESPONSE } from '../scpi-parser.js';
import { buildCommand, buildBoolCommand, buildTokenCommand, clip, formatNumber, significant } from '../command-builder.js';
import type { FieldShape } from '../param-validator.js';
import type { Messages } from '../messages.js';
import type { Tolerances, ReadbackStep } from '../readback.js';
import { writeAndVerify, verifyExact, verifyRange, verifyToken } from '../readback.js';
import type { NumericSetting } from '../driver-support.js';
import { paramNumber, numericReadback, relativeMatch } from '../driver-support.js';

export type SmuFunction = 'voltage' | 'current';
export type SenseFunction = SmuFunction | 'resistance';

export type SourceField =
  | 'OutputValue'
  | 'Readback'
  | 'Range'
  | 'AutoRange'
  | 'OutputOffState'
  | 'Interlock'
  | 'InterlockSignal'
  | 'LimitValue'
  | 'LimitTripped'
  | 'OVProtectionValue'
  | 'OVProtectionTripped'
  | 'Delay'
  | 'AutoDelay'
  | 'HighCapMode';

export type SenseField =
  | 'Unit'
  | 'Range'
  | 'AutoRange'
  | 'AutoRangeLowerLimit'
  | 'AutoRangeRebound'
  | 'NPLCycles'
  | 'AverageCount'
  | 'AverageMode'
  | 'RemoteSensing'
  | 'AutoZero'
  | 'OffsetCompensation';

/** Numbers for numeric and on/off settings (NaN when unknown), text for keywords */
export type ParameterValue = number | string;

export interface ParameterAccessor<M extends string> {
  shape: FieldShape;
  allowed?: readonly string[];
  get(mode: M): Promise<ParameterValue>;
  /** Absent for read-only fields */
  set?(value: string, mode: M): Promise<SetStatus>;
  describe(value: ParameterValue, mode: M): string;
}

export const FLAG_TOKENS = ['1', '0', 'ON', 'OFF', 'YES', 'NO', 'TRUE', 'FALSE'] as const;
const FLAG_ON = new Set(['1', 'ON', 'YES', 'TRUE']);

export const SOURCE_FIELDS: readonly SourceField[] = [
  'OutputValue', 'Readback', 'Range', 'AutoRange', 'OutputOffState', 'Interlock', 'InterlockSignal',
  'LimitValue', 'LimitTripped', 'OVProtectionValue', 'OVProtectionTripped', 'Delay', 'AutoDelay',
  'HighCapMode',
];

export const SENSE_FIELDS: readonly SenseField[] = [
  'Unit', 'Range', 'AutoRange', 'AutoRangeLowerLimit', 'AutoRangeRebound', 'NPLCycles',
  'AverageCount', 'AverageMode', 'RemoteSensing', 'AutoZero', 'OffsetCompensation',
];

type Span = readonly [number, number];

// Hardware limits of the 2450
const OUTPUT_SPAN: Record<SmuFunction, Span> = { current: [-1.05, 1.05], voltage: [-210, 210] };
const RANGE_SPAN: Record<SmuFunction, Span> = { current: [1e-11, 1], voltage: [0.02, 200] };
const LIMIT_SPAN: Record<SmuFunction, Span> = { current: [0.002, 210], voltage: [1e-9, 1.05] };
const DELAY_SPAN: Span = [0, 1];
const NPLC_SPAN: Span = [0.01, 10];
const AVERAGE_SPAN: Span = [0, 100];

const UNIT: Record<SenseFunction, string> = { current: 'A', voltage: 'V', resistance: 'Ohm' };

// Voltage protection steps in V; above the last step protection is off
const OVP_STEPS = [2, 5, 10, 20, 40, 60, 80, 100, 120, 140, 160, 180] as const;

/**
 * Map a requested protection voltage to the device token.
 *
 * 15 -> 'PROT20', 180 -> 'PROT180', 200 -> 'NONE', 0 -> null (not sent)
 */
export function ovpToken(volts: number): string | null {
  if (Number.isNaN(volts) || volts <= 0) return null;
  const step = OVP_STEPS.find(s => volts <= s);
  return step === undefined ? 'NONE' : `PROT${step}`;
}

/** 'NONE' -> Infinity, 'PROT20' -> 20, anything else NaN */
export function parseOvp(response: string): number {
  const text = response.trim().toLowerCase();
  if (text === 'none') return Infinity;
  if (text.startsWith('prot') && text.length >= 5) return ScpiParser.parseNumberOr(text.slice(4), NaN);
  return NaN;
}

export function describeFlag(value: ParameterValue): string {
  if (value === 0) return 'Off (0)';
  if (value === 1) return 'On  (1)';
  return UNEXPECTED_RESPONSE;
}

function limitCommand(mode: SmuFunction): string {
  return mode === 'current' ? 'Vlimit' : 'Ilimit';
}

/** Device I/O shared by all accessors */
export interface ParameterIo {
  /** Trimmed reply, null on failure */
  queryText(cmd: string): Promise<string | null>;
  queryNumber(cmd: string): Promise<number>;
  /** 0, 1, or NaN */
  queryFlag(cmd: string): Promise<number>;
  queryKeyword(cmd: string, names: Record<string, string>): Promise<string>;
  applyNumber(setting: NumericSetting, value: string, check: 'relative' | 'range'): Promise<SetStatus>;
  applyFlag(label: string, path: string, value: string): Promise<SetStatus>;
  applyKeyword(label: string, path: string, token: string): Promise<SetStatus>;
  verify<T>(step: ReadbackStep<T>): Promise<SetStatus>;
  messages: Messages;
}

export function createParameterIo(transport: Transport, messages: Messages, tolerances: Tolerances): ParameterIo {
  async function verify<T>(step: ReadbackStep<T>): Promise<SetStatus> {
    const outcome = await writeAndVerify(transport, step, messages);
    return outcome.status;
  }

  return {
    messages,
    verify,

    async queryText(cmd: string): Promise<string | null> {
      const result = await transport.query(cmd);
      return result.ok ? result.value.trim() : null;
    },

    async queryNumber(cmd: string): Promise<number> {
      return ScpiParser.parseNumberResult(await transport.query(cmd));
    },

    async queryFlag(cmd: string): Promise<number> {
      const result = await transport.query(cmd);
      if (!result.ok) return NaN;
      const state = ScpiParser.parseState(result.value);
      return state === null ? NaN : Number(state);
    },

    async queryKeyword(cmd: string, names: Record<string, string>): Promise<string> {
      return ScpiParser.parseKeyword(await transport.query(cmd), names);
    },

    async applyNumber(setting: NumericSetting, value: string, check: 'relative' | 'range'): Promise<SetStatus> {
      const requested = paramNumber(value);
      if (requested === null) {
        messages.few(`No ${setting.name} value sent.`);
        return SetStatus.NotSent;
      }
      const built = buildCommand(setting, requested);
      const matches = check === 'range'
        ? (r: number, a: number) => verifyRange(r, a, tolerances)
        : relativeMatch(tolerances.relative);
      return verify(numericReadback(setting, built, matches));
    },

    async applyFlag(label: string, path: string, value: string): Promise<SetStatus> {
      const on = FLAG_ON.has(value);
      return verify<boolean | null>({
        label,
        command: buildBoolCommand(`${path} {value}`, on, '1/0'),
        query: `${path}?`,
        parse: response => ScpiParser.parseState(response),
        failed: null,
        matches: actual => verifyExact<boolean | null>(on, actual),
        wanted: on ? '1' : '0',
        show: actual => (actual === null ? 'NaN' : actual ? '1' : '0'),
      });
    },

    async applyKeyword(label: string, path: string, token: string): Promise<SetStatus> {
      return verify({
        label,
        command: buildTokenCommand(`${path} {value}`, token),
        query: `${path}?`,
        parse: response => response.trim(),
        failed: '',
        matches: actual => verifyToken(token, actual),
        wanted: token,
        show: actual => actual,
      });
    },
  };
}

function numeric<M extends string>(
  io: ParameterIo,
  label: string,
  path: (mode: M) => string,
  span: (mode: M) => Span | null,
  check: 'relative' | 'range',
  unit: (mode: M) => string
): ParameterAccessor<M> {
  return {
    shape: 'numeric',
    get: mode => io.queryNumber(`${path(mode)}?`),
    async set(value, mode) {
      const range = span(mode);
      if (range === null) {
        io.messages.warn(`${label} is not supported in ${mode} mode`);
        return SetStatus.NotSent;
      }
      const setting: NumericSetting = {
        name: label,
        template: `${path(mode)} {value}`,
        query: `${path(mode)}?`,
        unitScale: 1,
        range,
        format: significant(10),
      };
      return io.applyNumber(setting, value, check);
    },
    describe: (value, mode) => `${value} ${unit(mode)}`.trimEnd(),
  };
}

function flag<M extends string>(io: ParameterIo, label: string, path: (mode: M) => string): ParameterAccessor<M> {
  return {
    shape: 'token',
    allowed: FLAG_TOKENS,
    get: mode => io.queryFlag(`${path(mode)}?`),
    set: (value, mode) => io.applyFlag(label, path(mode), value),
    describe: describeFlag,
  };
}

function readOnlyFlag<M extends string>(io: ParameterIo, path: (mode: M) => string): ParameterAccessor<M> {
  return {
    shape: 'token',
    get: mode => io.queryFlag(`${path(mode)}?`),
    describe: describeFlag,
  };
}

/**
 * @param tokens - accepted input (upper case) to device token
 * @param names - device token to display name
 */
function keyword<M extends string>(
  io: ParameterIo,
  label: string,
  path: (mode: M) => string,
  tokens: Record<string, string>,
  names: Record<string, string>
): ParameterAccessor<M> {
  return {
    shape: 'token',
    allowed: Object.keys(tokens),
    get: mode => io.queryKeyword(`${path(mode)}?`, names),
    async set(value, mode) {
      const token = tokens[value];
      if (token === undefined) return SetStatus.NotSent;
      return io.applyKeyword(label, path(mode), token);
    },
    describe: value => String(value),
  };
}

const unitOf = (mode: SenseFunction) => UNIT[mode];

export function createSourceAccessors(io: ParameterIo): Record<SourceField, ParameterAccessor<SmuFunction>> {
  const source = (suffix: string) => (mode: SmuFunction) => `:Source:${mode}:${suffix}`;
  const limit = (mode: SmuFunction) => `:Source:${mode}:${limitCommand(mode)}`;

  return {
    OutputValue: numeric(io, 'OutputValue', source('Level:Amplitude'), m => OUTPUT_SPAN[m], 'relative', unitOf),
    Readback: flag(io, 'Readback', source('Read:Back')),
    Range: numeric(io, 'Range', source('Range'), m => RANGE_SPAN[m], 'range', unitOf),
    AutoRange: flag(io, 'AutoRange', source('Range:Auto')),
    OutputOffState: keyword(
      io,
      'OutputOffState',
      mode => `:Output:${mode}:SMode`,
      {
        NORMAL: 'NORM', NORM: 'NORM', NOR: 'NORM', NO: 'NORM', N: 'NORM',
        HIMPEDANCE: 'HIMP', HIMP: 'HIMP', HIM: 'HIMP', HIZ: 'HIMP', HI: 'HIMP', H: 'HIMP',
        ZERO: 'ZERO', ZER: 'ZERO', ZE: 'ZERO', Z: 'ZERO',
        GUARD: 'GUAR', GUAR: 'GUAR', GUA: 'GUAR', GU: 'GUAR', G: 'GUAR',
      },
      { NORM: 'normal', HIMP: 'himpedance', ZERO: 'zero', GUAR: 'guard' }
    ),
    Interlock: flag(io, 'Interlock', () => ':Output:Interlock:State'),
    InterlockSignal: readOnlyFlag(io, () => ':Output:Interlock:Tripped'),
    LimitValue: numeric(
      io,
      'LimitValue',
      limit,
      m => LIMIT_SPAN[m],
      'relative',
      mode => (mode === 'current' ? 'V' : 'A')
    ),
    LimitTripped: readOnlyFlag(io, mode => `${limit(mode)}:Tripped`),
    OVProtectionValue: {
      shape: 'numeric',
      async get() {
        const result = await io.queryText(':Source:Voltage:Protection:Level?');
        return result === null ? NaN : parseOvp(result);
      },
      async set(value) {
        const token = ovpToken(paramNumber(value) ?? NaN);
        if (token === null) {
          io.messages.few('No OVProtectionValue sent.');
          return SetStatus.NotSent;
        }
        return io.applyKeyword('OVProtectionValue', ':Source:Voltage:Protection:Level', token);
      },
      describe: value => `${value} V`,
    },
    OVProtectionTripped: readOnlyFlag(io, () => ':Source:Voltage:Protection:Tripped'),
    Delay: numeric(io, 'Delay', source('Delay'), () => DELAY_SPAN, 'relative', () => 's'),
    AutoDelay: flag(io, 'AutoDelay', source('Delay:Auto')),
    HighCapMode: flag(io, 'HighCapMode', source('High:Cap')),
  };
}

export function createSenseAccessors(io: ParameterIo): Record<SenseField, ParameterAccessor<SenseFunction>> {
  const sense = (suffix: string) => (mode: SenseFunction) => `:Sense:${mode}:${suffix}`;
  const measureSpan = (mode: SenseFunction) => (mode === 'resistance' ? null : RANGE_SPAN[mode]);

  return {
    Unit: keyword(
      io,
      'Unit',
      sense('Unit'),
      { VOLT: 'VOLT', V: 'VOLT', AMPERE: 'AMP', AMP: 'AMP', A: 'AMP', OHM: 'OHM', O: 'OHM', WATT: 'WATT', W: 'WATT' },
      { VOLT: 'volt', AMP: 'ampere', OHM: 'ohm', WATT: 'watt' }
    ),
    Range: numeric(io, 'Range', sense('Range'), measureSpan, 'range', unitOf),
    AutoRange: flag(io, 'AutoRange', sense('Range:Auto')),
    AutoRangeLowerLimit: {
      shape: 'numeric',
      get: mode => io.queryNumber(`:Sense:${mode}:Range:Auto:LLimit?`),
      async set(value, mode) {
        const span = measureSpan(mode);
        if (span === null) {
          io.messages.warn(`AutoRangeLowerLimit is not supported in ${mode} mode`);
          return SetStatus.NotSent;
        }
        // The lower limit may not exceed the current upper limit
        const upper = await io.queryNumber(`:Sense:${mode}:Range:Auto:ULimit?`);
        const range: Span = Number.isNaN(upper) ? span : [span[0], upper];
        const setting: NumericSetting = {
          name: 'AutoRangeLowerLimit',
          template: `:Sense:${mode}:Range:Auto:LLimit {value}`,
          query: `:Sense:${mode}:Range:Auto:LLimit?`,
          unitScale: 1,
          range,
          format: significant(10),
        };
        return io.applyNumber(setting, value, 'range');
      },
      describe: (value, mode) => `${value} ${UNIT[mode]}`,
    },
    AutoRangeRebound: flag(io, 'AutoRangeRebound', sense('Range:Auto:Rebound')),
    NPLCycles: numeric(io, 'NPLCycles', sense('NPLCycles'), () => NPLC_SPAN, 'relative', () => ''),
    AverageCount: {
      shape: 'numeric',
      async get(mode) {
        const state = await io.queryFlag(`:Sense:${mode}:Average:State?`);
        if (state !== 1) return state;
        return io.queryNumber(`:Sense:${mode}:Average:Count?`);
      },
      async set(value, mode) {
        const requested = paramNumber(value);
        if (requested === null) {
          io.messages.few('No AverageCount value sent.');
          return SetStatus.NotSent;
        }
        const count = clip(Math.round(requested), AVERAGE_SPAN);
        // 0 disables averaging and leaves the count alone
        const state = await io.applyFlag('AverageCount', `:Sense:${mode}:Average:State`, count > 0 ? '1' : '0');
        if (count === 0) return state;

        if (state !== SetStatus.Verified) return state;
        return io.verify({
          label: 'AverageCount',
          command: `:Sense:${mode}:Average:Count ${formatNumber(count, significant(10))}`,
          query: `:Sense:${mode}:Average:Count?`,
          parse: response => ScpiParser.parseNumberOr(response, NaN),
          failed: NaN,
          matches: actual => actual === count,
          wanted: String(count),
          show: String,
        });
      },
      describe: value => (value === 0 ? '0 (disabled averaging)' : `${value} (range: 1 ... 100)`),
    },
    AverageMode: keyword(
      io,
      'AverageMode',
      sense('Average:Tcontrol'),
      { REPEATINGAVERAGE: 'REP', REPEATING: 'REP', REPEAT: 'REP', REP: 'REP', MOVINGAVERAGE: 'MOV', MOVING: 'MOV', MOV: 'MOV' },
      { REP: 'repeatingAverage', MOV: 'movingAverage' }
    ),
    RemoteSensing: flag(io, 'RemoteSensing', sense('Rsense')),
    AutoZero: flag(io, 'AutoZero', sense('Azero:State')),
    OffsetCompensation: flag(io, 'OffsetCompensation', sense('Ocompensated')),
  };
}
