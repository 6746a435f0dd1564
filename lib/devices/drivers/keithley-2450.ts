/**
 * Keithley 2450 Source-Measure Unit Driver
 *
 * Note: USB-TMC, SCPI command set (not TSP).
 * Source and sense parameters apply to the currently selected function
 * (voltage or current) and are read from the device on every call.
 */

import type { Transport, DeviceMetadata, ErrorLogEntry, ConfigureReport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, SetStatus } from '../../../shared/types.js';
import { ScpiParser, UNEXPECTED_RESPONSE } from '../scpi-parser.js';
import { buildTokenCommand, clip, formatNumber, significant } from '../command-builder.js';
import { createParamValidator } from '../param-validator.js';
import type { FieldRule, ParamValidator } from '../param-validator.js';
import { verifyToken } from '../readback.js';
import { createErrorQueue } from '../error-queue.js';
import type { DriverOptions } from '../driver-support.js';
import { resolveDriverOptions, paramNumber, delay } from '../driver-support.js';
import type {
  SmuFunction,
  SenseFunction,
  SourceField,
  SenseField,
  ParameterValue,
  ParameterAccessor,
} from './keithley-2450-parameters.js';
import {
  SOURCE_FIELDS,
  SENSE_FIELDS,
  createParameterIo,
  createSourceAccessors,
  createSenseAccessors,
  describeFlag,
  FLAG_TOKENS,
} from './keithley-2450-parameters.js';

export const SMU_METADATA: DeviceMetadata = {
  name: 'Keithley2450',
  version: '1.0.0',
  date: '2026-01-19',
};

export const KEITHLEY_VENDOR_ID = 0x05E6;
export const KEITHLEY_2450_PRODUCT_ID = 0x2450;

export const DEFAULT_BUFFERS: readonly string[] = ['defbuffer1', 'defbuffer2'];

const TONE_FREQUENCY = { default: 1000, span: [20, 8000] as const };
const TONE_DURATION = { default: 1, span: [0.001, 100] as const };

export type OperationMode = 'Source:V_Sense:I' | 'Source:I_Sense:V';
export type Terminals = 'front' | 'rear';

const OPERATION_MODES: Record<string, OperationMode> = {
  SVMI: 'Source:V_Sense:I',
  'SOURCE:V_SENSE:I': 'Source:V_Sense:I',
  SIMV: 'Source:I_Sense:V',
  'SOURCE:I_SENSE:V': 'Source:I_Sense:V',
};

type GeneralField = 'frequency' | 'duration' | 'terminals' | 'mode' | 'state';

const GENERAL_FIELDS: readonly FieldRule<GeneralField>[] = [
  { name: 'frequency', aliases: ['frequency', 'freq'], shape: 'numeric' },
  { name: 'duration', aliases: ['duration', 'dur'], shape: 'numeric' },
  {
    name: 'terminals',
    aliases: ['terminals', 'terminal'],
    shape: 'token',
    allowed: ['F', 'FR', 'FRO', 'FRON', 'FRONT', 'R', 'RE', 'REA', 'REAR'],
  },
  {
    name: 'mode',
    aliases: ['mode', 'function'],
    shape: 'token',
    allowed: ['VOLTAGE', 'VOLT', 'V', 'CURRENT', 'CURR', 'I', 'RESISTANCE', 'RES', 'R'],
  },
  { name: 'state', aliases: ['state', 'output'], shape: 'token', allowed: FLAG_TOKENS },
];

const GENERAL_COMMANDS: Record<string, readonly GeneralField[]> = {
  outputTone: ['frequency', 'duration'],
  setTerminals: ['terminals'],
  setMode: ['mode'],
  setOutputState: ['state'],
};

const MODE_INPUT: Record<string, SenseFunction> = {
  VOLTAGE: 'voltage', VOLT: 'voltage', V: 'voltage',
  CURRENT: 'current', CURR: 'current', I: 'current',
  RESISTANCE: 'resistance', RES: 'resistance', R: 'resistance',
};

const SOURCE_MODE_NAMES: Record<string, SmuFunction> = { VOLT: 'voltage', CURR: 'current' };
const SENSE_MODE_NAMES: Record<string, SenseFunction> = {
  '"VOLT:DC"': 'voltage',
  '"CURR:DC"': 'current',
  '"RES"': 'resistance',
  'VOLT:DC': 'voltage',
  'CURR:DC': 'current',
  RES: 'resistance',
};
const TERMINAL_NAMES: Record<string, Terminals> = { FRON: 'front', FRONT: 'front', REAR: 'rear' };

export type KeywordReading<M extends string> = M | typeof UNEXPECTED_RESPONSE | '';

function isSmuFunction(value: string): value is SmuFunction {
  return value === 'voltage' || value === 'current';
}

function isSenseFunction(value: string): value is SenseFunction {
  return isSmuFunction(value) || value === 'resistance';
}

export interface Keithley2450Options extends DriverOptions {
  /** Pause after restarting the trigger model (default: 1000 ms) */
  triggerSettleMs?: number;
}

export interface Keithley2450 {
  readonly metadata: DeviceMetadata;

  connect(): Promise<Result<void, Error>>;
  disconnect(): Promise<Result<void, Error>>;
  reset(): Promise<Result<void, Error>>;
  clear(): Promise<Result<void, Error>>;
  lock(): Promise<Result<void, Error>>;
  unlock(): Promise<Result<void, Error>>;
  getId(): Promise<string>;

  outputEnable(): Promise<SetStatus>;
  outputDisable(): Promise<SetStatus>;
  setOutputState(value: unknown): Promise<SetStatus>;
  getOutputState(): Promise<number>;

  outputTone(...inputs: unknown[]): Promise<Result<void, Error>>;
  restartTrigger(): Promise<Result<void, Error>>;
  abortTrigger(): Promise<Result<void, Error>>;
  refreshZeroReference(): Promise<Result<void, Error>>;

  getTerminals(): Promise<KeywordReading<Terminals>>;
  setTerminals(value: unknown): Promise<SetStatus>;
  getTriggerState(): Promise<string>;
  getPowerLineFrequency(): Promise<number>;
  getActiveBuffer(): Promise<string>;

  setSourceMode(mode: unknown): Promise<SetStatus>;
  getSourceMode(): Promise<KeywordReading<SmuFunction>>;
  setSenseMode(mode: unknown): Promise<SetStatus>;
  getSenseMode(): Promise<KeywordReading<SenseFunction>>;
  setOperationMode(mode: string): Promise<SetStatus>;
  getOperationMode(): Promise<OperationMode | 'unknown'>;

  setSourceParameter(field: SourceField, value: unknown): Promise<SetStatus>;
  getSourceParameter(field: SourceField): Promise<ParameterValue>;
  getSourceParameters(): Promise<Partial<Record<SourceField, ParameterValue>>>;
  configureSource(...inputs: unknown[]): Promise<ConfigureReport<SourceField>>;

  setSenseParameter(field: SenseField, value: unknown): Promise<SetStatus>;
  getSenseParameter(field: SenseField): Promise<ParameterValue>;
  getSenseParameters(): Promise<Partial<Record<SenseField, ParameterValue>>>;
  configureSense(...inputs: unknown[]): Promise<ConfigureReport<SenseField>>;

  describeSettings(): Promise<string[]>;

  readErrors(): Promise<ErrorLogEntry[]>;
  errorHistory(): readonly ErrorLogEntry[];
  clearErrors(): Promise<Result<void, Error>>;

  getAvailableBuffers(): string[];
  isBuffer(name: string): boolean;
  addBuffer(name: string): Result<void, Error>;
  deleteBuffer(name: string): Result<void, Error>;
  resetBuffers(): void;
}

function fieldSpecs<F extends string, M extends string>(
  names: readonly F[],
  accessors: Record<F, ParameterAccessor<M>>
): FieldRule<F>[] {
  return names.map(name => ({
    name,
    aliases: [name.toLowerCase()],
    shape: accessors[name].shape,
    allowed: accessors[name].allowed,
  }));
}

export function createKeithley2450(transport: Transport, options: Keithley2450Options = {}): Keithley2450 {
  const { messages, tolerances, maxReads, metadata } = resolveDriverOptions(SMU_METADATA, options);
  const { triggerSettleMs = 1000 } = options;

  const io = createParameterIo(transport, messages, tolerances);
  const sourceAccessors = createSourceAccessors(io);
  const senseAccessors = createSenseAccessors(io);

  const general = createParamValidator({ fields: GENERAL_FIELDS, commands: GENERAL_COMMANDS, messages });
  const sourceValidator = createParamValidator({ fields: fieldSpecs(SOURCE_FIELDS, sourceAccessors), messages });
  const senseValidator = createParamValidator({ fields: fieldSpecs(SENSE_FIELDS, senseAccessors), messages });

  const errors = createErrorQueue(
    transport,
    {
      kind: 'eventlog',
      countQuery: ':System:Eventlog:Count? All',
      nextQuery: ':System:Eventlog:Next?',
      clearCommand: ':System:Clear',
    },
    messages,
    { maxReads }
  );

  let buffers: string[] = [...DEFAULT_BUFFERS];

  async function command(cmd: string): Promise<Result<void, Error>> {
    messages.all(`> ${cmd}`);
    const result = await transport.write(cmd);
    if (!result.ok) messages.warn(`'${cmd}' failed: ${result.error.message}`);
    return result;
  }

  // Wait for operation complete
  async function opc(): Promise<Result<void, Error>> {
    const result = await transport.query('*OPC?');
    if (!result.ok) return result;
    return result.value.trim() === '1'
      ? Ok(undefined)
      : Err(new Error(`unexpected *OPC? response: ${result.value.trim()}`));
  }

  async function sequence(...steps: (() => Promise<Result<void, Error>>)[]): Promise<Result<void, Error>> {
    let first: Result<void, Error> = Ok(undefined);
    for (const step of steps) {
      const result = await step();
      if (!result.ok && first.ok) first = result;
    }
    return first;
  }

  function generalValue(field: GeneralField, value: unknown, cmd: string): string | undefined {
    return general.get(general.check([field, value], cmd), field);
  }

  async function setOutput(on: boolean): Promise<SetStatus> {
    messages.few(on ? 'enable output' : 'disable output');
    return io.verify<number>({
      label: 'OutputState',
      command: on ? ':OUTP ON' : ':OUTP OFF',
      query: ':Output:State?',
      parse: response => ScpiParser.parseNumberOr(response, NaN),
      failed: NaN,
      matches: actual => actual === (on ? 1 : 0),
      wanted: on ? '1' : '0',
      show: String,
    });
  }

  async function afterOpen(): Promise<Result<void, Error>> {
    // Output off for safety
    const status = await setOutput(false);
    const done = await opc();
    if (status !== SetStatus.Verified) {
      return Err(new Error('output could not be switched off'));
    }
    return done;
  }

  async function getSourceMode(): Promise<KeywordReading<SmuFunction>> {
    return ScpiParser.parseKeyword(await transport.query(':Source:Function?'), SOURCE_MODE_NAMES);
  }

  async function getSenseMode(): Promise<KeywordReading<SenseFunction>> {
    return ScpiParser.parseKeyword(await transport.query(':Sense:Function?'), SENSE_MODE_NAMES);
  }

  async function applySourceMode(mode: SmuFunction): Promise<SetStatus> {
    return io.verify<string>({
      label: 'SourceMode',
      command: `:Source:Function ${mode}`,
      query: ':Source:Function?',
      parse: response => ScpiParser.parseKeyword(Ok(response), SOURCE_MODE_NAMES),
      failed: '',
      matches: actual => actual === mode,
      wanted: mode,
      show: actual => actual,
    });
  }

  async function applySenseMode(mode: SenseFunction): Promise<SetStatus> {
    return io.verify<string>({
      label: 'SenseMode',
      command: `:Sense:Function "${mode}"`,
      query: ':Sense:Function?',
      parse: response => ScpiParser.parseKeyword(Ok(response), SENSE_MODE_NAMES),
      failed: '',
      matches: actual => actual === mode,
      wanted: mode,
      show: actual => actual,
    });
  }

  function requestedMode(value: unknown): SenseFunction | null {
    const token = generalValue('mode', value, 'setMode');
    return token === undefined ? null : (MODE_INPUT[token] ?? null);
  }

  async function configure<F extends string, M extends string>(
    kind: string,
    validator: ParamValidator<F>,
    accessors: Record<F, ParameterAccessor<M>>,
    mode: string,
    isMode: (value: string) => value is M,
    inputs: readonly unknown[]
  ): Promise<ConfigureReport<F>> {
    const set = validator.check(inputs);
    const diagnostics = [...set.diagnostics];
    const statuses: Partial<Record<F, SetStatus>> = {};

    const reject = (name: F, reason: string) => {
      diagnostics.push(reason);
      messages.warn(`${reason}. Ignore and continue.`);
      statuses[name] = SetStatus.NotSent;
    };

    for (const { name, value } of set.params) {
      const setter = accessors[name].set;
      if (!isMode(mode)) {
        reject(name, `${kind} mode unknown, '${name}' not sent`);
      } else if (!setter) {
        reject(name, `parameter '${name}' is read-only`);
      } else {
        statuses[name] = await setter(value, mode);
      }
    }
    return { statuses, diagnostics };
  }

  async function readAll<F extends string, M extends string>(
    names: readonly F[],
    accessors: Record<F, ParameterAccessor<M>>,
    mode: string,
    isMode: (value: string) => value is M
  ): Promise<Partial<Record<F, ParameterValue>>> {
    const values: Partial<Record<F, ParameterValue>> = {};
    for (const name of names) {
      values[name] = isMode(mode) ? await accessors[name].get(mode) : NaN;
    }
    return values;
  }

  async function getOperationMode(): Promise<OperationMode | 'unknown'> {
    const source = await getSourceMode();
    const sense = await getSenseMode();
    if (source === 'voltage' && sense === 'current') return 'Source:V_Sense:I';
    if (source === 'current' && sense === 'voltage') return 'Source:I_Sense:V';
    return 'unknown';
  }

  async function getTerminals(): Promise<KeywordReading<Terminals>> {
    return ScpiParser.parseKeyword(await transport.query(':Route:Terminals?'), TERMINAL_NAMES);
  }

  async function getOutputState(): Promise<number> {
    const result = await transport.query(':Output:State?');
    if (!result.ok) return NaN;
    const value = result.value.trim();
    return value === '0' ? 0 : value === '1' ? 1 : NaN;
  }

  async function getTriggerState(): Promise<string> {
    const result = await transport.query(':Trigger:State?');
    if (!result.ok) return '';
    const parts = result.value.trim().toLowerCase().split(';');
    return parts.length === 3 ? parts[0] : UNEXPECTED_RESPONSE;
  }

  async function getActiveBuffer(): Promise<string> {
    const result = await transport.query(':Display:Buffer:Active?');
    return result.ok ? result.value.trim().toLowerCase() : '';
  }

  const getPowerLineFrequency = async () => ScpiParser.parseNumberResult(await transport.query(':System:LFrequency?'));

  async function configureSource(...inputs: unknown[]): Promise<ConfigureReport<SourceField>> {
    return configure('source', sourceValidator, sourceAccessors, await getSourceMode(), isSmuFunction, inputs);
  }

  async function configureSense(...inputs: unknown[]): Promise<ConfigureReport<SenseField>> {
    return configure('sense', senseValidator, senseAccessors, await getSenseMode(), isSenseFunction, inputs);
  }

  return {
    metadata,

    async connect(): Promise<Result<void, Error>> {
      const opened = await transport.open();
      if (!opened.ok) return opened;
      messages.few(`Connected (driver ${metadata.version}, ${metadata.date})`);
      return afterOpen();
    },

    async disconnect(): Promise<Result<void, Error>> {
      // Output off before closing
      const before = await sequence(() => command(':OUTP OFF'), opc);
      const closed = await transport.close();
      return before.ok ? closed : before;
    },

    async reset(): Promise<Result<void, Error>> {
      messages.few('execute reset macro');
      return sequence(
        async () => {
          const result = await command('*RST');
          if (result.ok) buffers = [...DEFAULT_BUFFERS];
          return result;
        },
        () => command('*CLS'),
        afterOpen
      );
    },

    async clear(): Promise<Result<void, Error>> {
      messages.few('clear status');
      return sequence(() => command('*CLS'), opc);
    },

    async lock(): Promise<Result<void, Error>> {
      messages.warn(`lock is not supported by ${metadata.name}, the front panel stays unlocked`);
      return Ok(undefined);
    },

    async unlock(): Promise<Result<void, Error>> {
      messages.warn(`unlock is not supported by ${metadata.name}, the front panel is never locked remotely`);
      return Ok(undefined);
    },

    async getId(): Promise<string> {
      const result = await transport.query('*IDN?');
      return result.ok ? result.value.trim() : '';
    },

    outputEnable: () => setOutput(true),
    outputDisable: () => setOutput(false),

    async setOutputState(value: unknown): Promise<SetStatus> {
      const token = generalValue('state', value, 'setOutputState');
      if (token === undefined) return SetStatus.NotSent;
      return io.applyFlag('OutputState', ':Output:State', token);
    },

    getOutputState,

    async outputTone(...inputs: unknown[]): Promise<Result<void, Error>> {
      const set = general.check(inputs, 'outputTone');
      const frequency = clip(
        paramNumber(general.get(set, 'frequency')) ?? TONE_FREQUENCY.default,
        TONE_FREQUENCY.span
      );
      const duration = clip(
        paramNumber(general.get(set, 'duration')) ?? TONE_DURATION.default,
        TONE_DURATION.span
      );
      messages.few(`generate a tone (${frequency} Hz for ${duration} s)`);
      // Returns at once; the tone keeps sounding
      return command(`:System:Beeper ${formatNumber(frequency, significant(10))},${formatNumber(duration, significant(10))}`);
    },

    async restartTrigger(): Promise<Result<void, Error>> {
      messages.few('restart trigger (continuous measurements)');
      // Any following command stops the continuous trigger, so no readback
      const result = await command(':Trigger:Continuous Restart');
      await delay(triggerSettleMs);
      return result;
    },

    async abortTrigger(): Promise<Result<void, Error>> {
      messages.few('abort trigger');
      return sequence(() => command(':Abort'), opc);
    },

    async refreshZeroReference(): Promise<Result<void, Error>> {
      messages.few('refresh of the reference and zero measurement');
      return sequence(() => command(':Sense:Azero:Once'), opc);
    },

    getTerminals,

    async setTerminals(value: unknown): Promise<SetStatus> {
      const token = generalValue('terminals', value, 'setTerminals');
      if (token === undefined) return SetStatus.NotSent;
      const wanted: Terminals = token.startsWith('F') ? 'front' : 'rear';
      return io.verify<string>({
        label: 'Terminals',
        command: buildTokenCommand(':Route:Terminals {value}', wanted),
        query: ':Route:Terminals?',
        parse: response => ScpiParser.parseKeyword(Ok(response), TERMINAL_NAMES),
        failed: '',
        matches: actual => verifyToken(wanted, actual),
        wanted,
        show: actual => actual,
      });
    },

    getTriggerState,
    getPowerLineFrequency,
    getActiveBuffer,

    async setSourceMode(mode: unknown): Promise<SetStatus> {
      const wanted = requestedMode(mode);
      if (wanted === null || !isSmuFunction(wanted)) {
        messages.warn('source mode must be voltage or current');
        return SetStatus.NotSent;
      }
      return applySourceMode(wanted);
    },

    getSourceMode,

    async setSenseMode(mode: unknown): Promise<SetStatus> {
      const wanted = requestedMode(mode);
      if (wanted === null) return SetStatus.NotSent;
      return applySenseMode(wanted);
    },

    getSenseMode,

    async setOperationMode(mode: string): Promise<SetStatus> {
      const wanted = OPERATION_MODES[mode.trim().toUpperCase()];
      if (wanted === undefined) {
        messages.warn(`invalid operation mode '${mode}', valid values are: ${Object.keys(OPERATION_MODES).join(', ')}`);
        return SetStatus.NotSent;
      }
      const [sense, source]: [SenseFunction, SmuFunction] = wanted === 'Source:V_Sense:I'
        ? ['current', 'voltage']
        : ['voltage', 'current'];
      const senseStatus = await applySenseMode(sense);
      const sourceStatus = await applySourceMode(source);
      return senseStatus === SetStatus.Verified ? sourceStatus : senseStatus;
    },

    getOperationMode,

    async setSourceParameter(field: SourceField, value: unknown): Promise<SetStatus> {
      const report = await configureSource(field, value);
      return report.statuses[field] ?? SetStatus.NotSent;
    },

    async getSourceParameter(field: SourceField): Promise<ParameterValue> {
      const mode = await getSourceMode();
      return isSmuFunction(mode) ? sourceAccessors[field].get(mode) : NaN;
    },

    async getSourceParameters(): Promise<Partial<Record<SourceField, ParameterValue>>> {
      return readAll(SOURCE_FIELDS, sourceAccessors, await getSourceMode(), isSmuFunction);
    },

    configureSource,

    async setSenseParameter(field: SenseField, value: unknown): Promise<SetStatus> {
      const report = await configureSense(field, value);
      return report.statuses[field] ?? SetStatus.NotSent;
    },

    async getSenseParameter(field: SenseField): Promise<ParameterValue> {
      const mode = await getSenseMode();
      return isSenseFunction(mode) ? senseAccessors[field].get(mode) : NaN;
    },

    async getSenseParameters(): Promise<Partial<Record<SenseField, ParameterValue>>> {
      return readAll(SENSE_FIELDS, senseAccessors, await getSenseMode(), isSenseFunction);
    },

    configureSense,

    async describeSettings(): Promise<string[]> {
      const top = (name: string, text: string) => `  ${name.padEnd(21)}= ${text}`;
      const sub = (name: string, text: string) => `   .${name.padEnd(19)}= ${text}`;

      const sourceMode = await getSourceMode();
      const senseMode = await getSenseMode();
      const lines = [
        `Settings of ${metadata.name}`,
        top('ActiveBuffer', await getActiveBuffer()),
        top('OutputState', describeFlag(await getOutputState())),
        top('TriggerState', await getTriggerState()),
        top('Terminals', await getTerminals()),
        top('PowerLineFrequency', `${await getPowerLineFrequency()} Hz`),
        top('OperationMode', await getOperationMode()),
        top('SourceMode', sourceMode),
        '  SourceParameters :',
      ];
      if (isSmuFunction(sourceMode)) {
        for (const name of SOURCE_FIELDS) {
          const accessor = sourceAccessors[name];
          lines.push(sub(name, accessor.describe(await accessor.get(sourceMode), sourceMode)));
        }
      }
      lines.push(top('SenseMode', senseMode), '  SenseParameters  :');
      if (isSenseFunction(senseMode)) {
        for (const name of SENSE_FIELDS) {
          const accessor = senseAccessors[name];
          lines.push(sub(name, accessor.describe(await accessor.get(senseMode), senseMode)));
        }
      }

      for (const line of lines) messages.few(line);
      return lines;
    },

    readErrors: () => errors.read(),
    errorHistory: () => errors.history(),
    clearErrors: () => errors.clear(),

    getAvailableBuffers: () => [...buffers],

    isBuffer(name: string): boolean {
      return buffers.some(b => b.toLowerCase() === name.toLowerCase());
    },

    addBuffer(name: string): Result<void, Error> {
      if (buffers.some(b => b.toLowerCase() === name.toLowerCase())) {
        return Err(new Error(`buffer '${name}' already exists`));
      }
      buffers.push(name);
      return Ok(undefined);
    },

    deleteBuffer(name: string): Result<void, Error> {
      const key = name.toLowerCase();
      if (DEFAULT_BUFFERS.some(b => b === key)) {
        return Err(new Error(`default buffer '${name}' cannot be deleted`));
      }
      const index = buffers.findIndex(b => b.toLowerCase() === key);
      if (index < 0) {
        return Err(new Error(`buffer '${name}' does not exist`));
      }
      buffers.splice(index, 1);
      return Ok(undefined);
    },

    resetBuffers(): void {
      buffers = [...DEFAULT_BUFFERS];
    },
  };
}
