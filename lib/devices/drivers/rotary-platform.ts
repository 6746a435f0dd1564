/**
 * Rotary Platform Driver
 *
 * Note: Serial at 115200 baud, CR/LF terminated, and the firmware echoes
 * every command line before answering. Movement is asynchronous: setAngle()
 * returns once the target is accepted, callers poll isReached().
 */

import type { Transport, DeviceMetadata, ErrorLogEntry, ConfigureReport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { SetStatus } from '../../../shared/types.js';
import { ScpiParser } from '../scpi-parser.js';
import { buildCommand, buildBoolCommand, significant } from '../command-builder.js';
import { createParamValidator } from '../param-validator.js';
import type { FieldRule } from '../param-validator.js';
import { writeAndVerify, verifyExact } from '../readback.js';
import { createErrorQueue } from '../error-queue.js';
import type { SerialConfig } from '../transports/serial.js';
import type { DriverOptions, NumericSetting } from '../driver-support.js';
import { resolveDriverOptions, paramNumber, numericReadback } from '../driver-support.js';

export type RotaryField = 'angle' | 'upperlimit' | 'lowerlimit' | 'remote' | 'local';

export const ROTARY_METADATA: DeviceMetadata = {
  name: 'RotaryPlatform',
  version: '1.0.0',
  date: '2026-01-19',
};

/** Serial settings of the platform firmware */
export function rotarySerialConfig(path: string, commandDelay = 50): SerialConfig {
  return { path, baudRate: 115200, terminator: '\r\n', echo: true, commandDelay, timeout: 10000 };
}

const ANGLE_SPAN = [-360, 360] as const;

const SWITCH_TOKENS = ['1', '0', 'ON', 'OFF', 'TRUE', 'FALSE', 'YES', 'NO'];
const SWITCH_ON = new Set(['1', 'ON', 'TRUE', 'YES']);

const FIELDS: readonly FieldRule<RotaryField>[] = [
  { name: 'angle', aliases: ['angle', 'position'], shape: 'numeric' },
  { name: 'upperlimit', aliases: ['upper', 'upperlimit'], shape: 'numeric' },
  { name: 'lowerlimit', aliases: ['lower', 'lowerlimit'], shape: 'numeric' },
  { name: 'remote', aliases: ['remote', 'enableremote'], shape: 'token', allowed: SWITCH_TOKENS },
  { name: 'local', aliases: ['local', 'enablelocal'], shape: 'token', allowed: SWITCH_TOKENS },
];

const COMMANDS: Record<string, readonly RotaryField[]> = {
  setAngle: ['angle'],
  setUpperLimit: ['upperlimit'],
  setLowerLimit: ['lowerlimit'],
  setMotorEnableRemote: ['remote'],
  setMotorEnableLocal: ['local'],
};

const SETTINGS = {
  angle: { name: 'angle', template: 'ROTAtion:ANGLE {value}', query: 'ROTAtion:ANGLE?', unitScale: 1, range: ANGLE_SPAN, format: significant(10) },
  upperLimit: { name: 'upper limit', template: 'ROTAtion:LIMit:UPPer {value}', query: 'ROTAtion:LIMit:UPPer?', unitScale: 1, range: ANGLE_SPAN, format: significant(10) },
  lowerLimit: { name: 'lower limit', template: 'ROTAtion:LIMit:LOWer {value}', query: 'ROTAtion:LIMit:LOWer?', unitScale: 1, range: ANGLE_SPAN, format: significant(10) },
} satisfies Record<string, NumericSetting>;

// Angles are echoed back with limited resolution
const ANGLE_TOLERANCE = 1e-3;

export interface RotaryPlatform {
  readonly metadata: DeviceMetadata;

  connect(): Promise<Result<void, Error>>;
  disconnect(): Promise<Result<void, Error>>;
  getId(): Promise<string>;
  getError(): Promise<string>;

  lockLocal(): Promise<Result<void, Error>>;
  unlockLocal(): Promise<Result<void, Error>>;
  isLocked(): Promise<boolean>;

  setAngle(degrees: number | string): Promise<SetStatus>;
  getTargetAngle(): Promise<number>;
  getPosition(): Promise<number>;
  isReached(): Promise<boolean>;

  setUpperLimit(degrees: number | string): Promise<SetStatus>;
  getUpperLimit(): Promise<number>;
  setLowerLimit(degrees: number | string): Promise<SetStatus>;
  getLowerLimit(): Promise<number>;

  isMotorEnabled(): Promise<boolean>;
  isMotorEnableLocal(): Promise<boolean>;
  isMotorEnableRemote(): Promise<boolean>;
  isMotorVoltLockout(): Promise<boolean>;
  setMotorEnableRemote(enable: boolean | number | string): Promise<SetStatus>;
  setMotorEnableLocal(enable: boolean | number | string): Promise<SetStatus>;

  configure(...inputs: unknown[]): Promise<ConfigureReport<RotaryField>>;

  readErrors(): Promise<ErrorLogEntry[]>;
  errorHistory(): readonly ErrorLogEntry[];
  clearErrors(): Promise<Result<void, Error>>;
}

export function createRotaryPlatform(transport: Transport, options: DriverOptions = {}): RotaryPlatform {
  const { messages, maxReads, metadata } = resolveDriverOptions(ROTARY_METADATA, options);
  const validator = createParamValidator({ fields: FIELDS, commands: COMMANDS, messages });
  const errors = createErrorQueue(
    transport,
    { kind: 'scpi', query: 'SYSTem:ERRor?', clearCommand: '*CLS' },
    messages,
    { maxReads }
  );

  async function command(cmd: string): Promise<Result<void, Error>> {
    messages.all(`> ${cmd}`);
    const result = await transport.write(cmd);
    if (!result.ok) messages.warn(`'${cmd}' failed: ${result.error.message}`);
    return result;
  }

  async function queryText(cmd: string): Promise<string> {
    const result = await transport.query(cmd);
    return result.ok ? result.value.trim() : '';
  }

  const queryNumber = async (cmd: string) => ScpiParser.parseNumberResult(await transport.query(cmd));
  const queryBool = async (cmd: string) => ScpiParser.parseBoolResult(await transport.query(cmd));

  async function applyAngle(setting: NumericSetting, value: string | undefined): Promise<SetStatus> {
    const requested = paramNumber(value);
    if (requested === null) {
      messages.few(`No ${setting.name} value sent.`);
      return SetStatus.NotSent;
    }
    const built = buildCommand(setting, requested);
    if (built.clipped) {
      messages.warn(`${setting.name} ${requested} out of range, clipped to ${built.value}`);
    }
    messages.few(`Setting ${setting.name} to ${built.value} deg`);
    const outcome = await writeAndVerify(
      transport,
      numericReadback(setting, built, (r, a) => Math.abs(a - r) <= ANGLE_TOLERANCE),
      messages
    );
    return outcome.status;
  }

  async function applySwitch(label: string, path: string, value: string | undefined): Promise<SetStatus> {
    if (value === undefined) {
      messages.few(`No ${label} value sent.`);
      return SetStatus.NotSent;
    }
    const on = SWITCH_ON.has(value);
    const outcome = await writeAndVerify<boolean | null>(transport, {
      label,
      command: buildBoolCommand(`${path} {value}`, on, '1/0'),
      query: `${path}?`,
      parse: response => ScpiParser.parseState(response),
      failed: null,
      matches: actual => verifyExact<boolean | null>(on, actual),
      wanted: on ? '1' : '0',
      show: actual => (actual === null ? 'unknown' : actual ? '1' : '0'),
    }, messages);
    return outcome.status;
  }

  const appliers: Record<RotaryField, (value: string) => Promise<SetStatus>> = {
    angle: value => applyAngle(SETTINGS.angle, value),
    upperlimit: value => applyAngle(SETTINGS.upperLimit, value),
    lowerlimit: value => applyAngle(SETTINGS.lowerLimit, value),
    remote: value => applySwitch('remote motor enable', 'MOTOR:ENABLEREMote', value),
    local: value => applySwitch('local motor enable', 'MOTOR:ENABLELOCal', value),
  };

  function checked(field: RotaryField, value: unknown, cmd: string): string | undefined {
    return validator.get(validator.check([field, value], cmd), field);
  }

  async function setField(field: RotaryField, value: unknown, cmd: string): Promise<SetStatus> {
    const accepted = checked(field, value, cmd);
    return accepted === undefined ? SetStatus.NotSent : appliers[field](accepted);
  }

  return {
    metadata,

    async connect(): Promise<Result<void, Error>> {
      const result = await transport.open();
      if (result.ok) {
        messages.few(`Connected (driver ${metadata.version}, ${metadata.date})`);
      }
      return result;
    },

    disconnect: () => transport.close(),

    getId: () => queryText('*IDN?'),
    getError: () => queryText('SYSTem:ERRor?'),

    lockLocal: () => command('SYSTem:LOCal:LOCK'),
    unlockLocal: () => command('SYSTem:LOCal:UNLock'),
    isLocked: () => queryBool('SYSTem:LOCal:LOCK?'),

    setAngle: degrees => setField('angle', degrees, 'setAngle'),
    getTargetAngle: () => queryNumber(SETTINGS.angle.query),
    getPosition: () => queryNumber('ROTAtion:POSition?'),
    isReached: () => queryBool('ROTAtion:REACHED?'),

    setUpperLimit: degrees => setField('upperlimit', degrees, 'setUpperLimit'),
    getUpperLimit: () => queryNumber(SETTINGS.upperLimit.query),
    setLowerLimit: degrees => setField('lowerlimit', degrees, 'setLowerLimit'),
    getLowerLimit: () => queryNumber(SETTINGS.lowerLimit.query),

    isMotorEnabled: () => queryBool('MOTOR:ENABLED?'),
    isMotorEnableLocal: () => queryBool('MOTOR:ENABLELOCal?'),
    isMotorEnableRemote: () => queryBool('MOTOR:ENABLEREMote?'),
    isMotorVoltLockout: () => queryBool('MOTOR:VOLTLOCKout?'),
    setMotorEnableRemote: enable => setField('remote', enable, 'setMotorEnableRemote'),
    setMotorEnableLocal: enable => setField('local', enable, 'setMotorEnableLocal'),

    async configure(...inputs: unknown[]): Promise<ConfigureReport<RotaryField>> {
      const set = validator.check(inputs);
      const statuses: Partial<Record<RotaryField, SetStatus>> = {};
      for (const { name, value } of set.params) {
        statuses[name] = await appliers[name](value);
      }
      return { statuses, diagnostics: set.diagnostics };
    },

    readErrors: () => errors.read(),
    errorHistory: () => errors.history(),
    clearErrors: () => errors.clear(),
  };
}
