/**
 * ComboSource 6301 Laser Diode Controller Driver
 *
 * Note: Serial (RS-232/USB), LF-terminated SCPI, no command echo.
 * Currents and powers are handled in mA/mW by callers and sent in A/W.
 * Every setter reads its value back once and reports a SetStatus.
 */

import type {
  Transport,
  DeviceMetadata,
  DeviceStatus,
  ErrorLogEntry,
  LaserMode,
  ConfigureReport,
} from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, SetStatus } from '../../../shared/types.js';
import { ScpiParser, UNEXPECTED_RESPONSE } from '../scpi-parser.js';
import { buildCommand, buildBoolCommand, buildTokenCommand, fixed, toCallerUnits } from '../command-builder.js';
import { createParamValidator } from '../param-validator.js';
import type { FieldRule } from '../param-validator.js';
import { writeAndVerify, verifyExact } from '../readback.js';
import { createErrorQueue } from '../error-queue.js';
import type { DriverOptions, NumericSetting } from '../driver-support.js';
import { resolveDriverOptions, paramNumber, numericReadback, relativeMatch, delay } from '../driver-support.js';

export type LaserField = 'current' | 'power' | 'temperature' | 'mode' | 'enable' | 'limit';

export type SetpointInput = number | string;

const RESET_SETTLE_MS = 500;

export const LASER_METADATA: DeviceMetadata = {
  name: 'ComboSource6301',
  version: '1.0.0',
  date: '2026-01-19',
};

const FIELDS: readonly FieldRule<LaserField>[] = [
  { name: 'current', aliases: ['current', 'curr', 'i'], shape: 'numeric' },
  { name: 'power', aliases: ['power', 'pow', 'p'], shape: 'numeric' },
  { name: 'temperature', aliases: ['temperature', 'temp', 't'], shape: 'numeric' },
  {
    name: 'mode',
    aliases: ['mode', 'opmode'],
    shape: 'token',
    allowed: ['CURR', 'CURRENT', 'CC', 'POW', 'POWER', 'CP'],
  },
  {
    name: 'enable',
    aliases: ['enable', 'output'],
    shape: 'token',
    allowed: ['1', '0', 'ON', 'OFF', 'TRUE', 'FALSE', 'YES', 'NO'],
  },
  { name: 'limit', aliases: ['limit', 'lim'], shape: 'numeric' },
];

const COMMANDS: Record<string, readonly LaserField[]> = {
  setCurrent: ['current'],
  setPower: ['power'],
  setCurrentLimit: ['limit'],
  setPowerLimit: ['limit'],
  setTempLimitLow: ['temperature'],
  setTempLimitHigh: ['temperature'],
  setMode: ['mode'],
  enableLaser: ['enable'],
};

const SETTINGS = {
  current: { name: 'current', template: 'SOUR:CURR {value}', query: 'SOUR:CURR?', unitScale: 0.001, format: fixed(6) },
  currentLimit: { name: 'current limit', template: 'SOUR:CURR:LIM {value}', query: 'SOUR:CURR:LIM?', unitScale: 0.001, format: fixed(6) },
  power: { name: 'power', template: 'SOUR:POW {value}', query: 'SOUR:POW?', unitScale: 0.001, format: fixed(6) },
  powerLimit: { name: 'power limit', template: 'SOUR:POW:LIM {value}', query: 'SOUR:POW:LIM?', unitScale: 0.001, format: fixed(6) },
  tempLimitLow: { name: 'low temperature limit', template: 'SOUR:TEMP:LIM:LOW {value}', query: 'SOUR:TEMP:LIM:LOW?', unitScale: 1, format: fixed(3) },
  tempLimitHigh: { name: 'high temperature limit', template: 'SOUR:TEMP:LIM:HIGH {value}', query: 'SOUR:TEMP:LIM:HIGH?', unitScale: 1, format: fixed(3) },
} satisfies Record<string, NumericSetting>;

const MODE_TOKENS: Record<string, 'CURR' | 'POW'> = {
  CURR: 'CURR',
  CURRENT: 'CURR',
  CC: 'CURR',
  POW: 'POW',
  POWER: 'POW',
  CP: 'POW',
};

const MODE_NAMES: Record<string, LaserMode> = {
  CURR: 'CurrentMode',
  POW: 'PowerMode',
};

const ENABLE_TOKENS = new Set(['1', 'ON', 'TRUE', 'YES']);

export type ModeReading = LaserMode | typeof UNEXPECTED_RESPONSE | '';

function isLaserMode(value: string): value is LaserMode {
  return value === 'CurrentMode' || value === 'PowerMode';
}

export interface ComboSource6301 {
  readonly metadata: DeviceMetadata;

  connect(): Promise<Result<void, Error>>;
  disconnect(): Promise<Result<void, Error>>;
  reset(): Promise<Result<void, Error>>;
  clear(): Promise<Result<void, Error>>;
  lock(): Promise<Result<void, Error>>;
  unlock(): Promise<Result<void, Error>>;
  getId(): Promise<string>;
  getError(): Promise<string>;

  enableLaser(): Promise<SetStatus>;
  disableLaser(): Promise<SetStatus>;
  setOutput(enabled: boolean | string | number): Promise<SetStatus>;
  isLaserEnabled(): Promise<boolean>;

  setCurrent(milliamps: SetpointInput): Promise<SetStatus>;
  getCurrent(): Promise<number>;
  getMeasuredCurrent(): Promise<number>;
  setCurrentLimit(milliamps: SetpointInput): Promise<SetStatus>;
  getCurrentLimit(): Promise<number>;

  setPower(milliwatts: SetpointInput): Promise<SetStatus>;
  getPower(): Promise<number>;
  getMeasuredPower(): Promise<number>;
  setPowerLimit(milliwatts: SetpointInput): Promise<SetStatus>;
  getPowerLimit(): Promise<number>;

  getTemperature(): Promise<number>;
  getTECCurrent(): Promise<number>;
  setTempLimitLow(celsius: SetpointInput): Promise<SetStatus>;
  getTempLimitLow(): Promise<number>;
  setTempLimitHigh(celsius: SetpointInput): Promise<SetStatus>;
  getTempLimitHigh(): Promise<number>;

  setMode(mode: string): Promise<SetStatus>;
  setModeConstantCurrent(): Promise<SetStatus>;
  setModeConstantPower(): Promise<SetStatus>;
  getMode(): Promise<ModeReading>;

  getStatusByte(): Promise<number>;
  isInterlockClosed(): Promise<boolean>;
  isOverTemp(): Promise<boolean>;

  configure(...inputs: unknown[]): Promise<ConfigureReport<LaserField>>;
  getStatus(): Promise<DeviceStatus>;

  readErrors(): Promise<ErrorLogEntry[]>;
  errorHistory(): readonly ErrorLogEntry[];
  clearErrors(): Promise<Result<void, Error>>;
}

export function createComboSource6301(transport: Transport, options: DriverOptions = {}): ComboSource6301 {
  const { messages, tolerances, maxReads, metadata } = resolveDriverOptions(LASER_METADATA, options);
  const validator = createParamValidator({ fields: FIELDS, commands: COMMANDS, messages });
  const errors = createErrorQueue(
    transport,
    { kind: 'scpi', query: 'SYST:ERR?', clearCommand: '*CLS' },
    messages,
    { maxReads }
  );

  // Session status cache
  const status: DeviceStatus = { outputEnabled: false, mode: null };

  async function command(cmd: string): Promise<Result<void, Error>> {
    messages.all(`> ${cmd}`);
    const result = await transport.write(cmd);
    if (!result.ok) messages.warn(`'${cmd}' failed: ${result.error.message}`);
    return result;
  }

  async function queryNumber(cmd: string): Promise<number> {
    return ScpiParser.parseNumberResult(await transport.query(cmd));
  }

  async function queryScaled(setting: NumericSetting, cmd: string = setting.query): Promise<number> {
    return toCallerUnits(setting, await queryNumber(cmd));
  }

  async function queryText(cmd: string): Promise<string> {
    const result = await transport.query(cmd);
    return result.ok ? result.value.trim() : '';
  }

  // Appliers take a value already accepted by the validator
  async function applyNumber(setting: NumericSetting, value: string | undefined): Promise<SetStatus> {
    const requested = paramNumber(value);
    if (requested === null) {
      messages.few(`No ${setting.name} value sent.`);
      return SetStatus.NotSent;
    }
    const built = buildCommand(setting, requested);
    messages.few(`Setting ${setting.name} to ${built.value}`);
    const outcome = await writeAndVerify(
      transport,
      numericReadback(setting, built, relativeMatch(tolerances.relative)),
      messages
    );
    return outcome.status;
  }

  async function applyMode(value: string | undefined): Promise<SetStatus> {
    const token = value === undefined ? undefined : MODE_TOKENS[value];
    if (token === undefined) {
      messages.few('No mode value sent.');
      return SetStatus.NotSent;
    }
    const wanted = MODE_NAMES[token];
    const outcome = await writeAndVerify<ModeReading>(transport, {
      label: 'mode',
      command: buildTokenCommand('SOUR:FUNC:MODE {value}', token),
      query: 'SOUR:FUNC:MODE?',
      parse: response => ScpiParser.parseKeyword(Ok(response), MODE_NAMES),
      failed: '',
      matches: actual => verifyExact<ModeReading>(wanted, actual),
      wanted,
      show: actual => actual || '(no response)',
    }, messages);
    status.mode = isLaserMode(outcome.actual) ? outcome.actual : null;
    return outcome.status;
  }

  async function applyEnable(value: string | undefined): Promise<SetStatus> {
    if (value === undefined) {
      messages.few('No output state sent.');
      return SetStatus.NotSent;
    }
    const enabled = ENABLE_TOKENS.has(value);
    messages.few(enabled ? 'Enabling laser output' : 'Disabling laser output');
    const outcome = await writeAndVerify<boolean | null>(transport, {
      label: 'output',
      command: buildBoolCommand('OUTP {value}', enabled, 'ON/OFF'),
      query: 'OUTP?',
      parse: response => ScpiParser.parseState(response),
      failed: null,
      matches: actual => verifyExact<boolean | null>(enabled, actual),
      wanted: enabled ? 'ON' : 'OFF',
      show: actual => (actual === null ? 'unknown' : actual ? 'ON' : 'OFF'),
    }, messages);
    status.outputEnabled = outcome.actual === true;
    return outcome.status;
  }

  async function applyLimit(value: string | undefined): Promise<SetStatus> {
    let mode = status.mode;
    if (mode === null) {
      const reading = await getMode();
      mode = isLaserMode(reading) ? reading : null;
    }
    if (mode === null) {
      messages.warn('operating mode unknown, limit applied as current limit');
    }
    return applyNumber(mode === 'PowerMode' ? SETTINGS.powerLimit : SETTINGS.currentLimit, value);
  }

  function checked(field: LaserField, value: unknown, cmd: string): string | undefined {
    return validator.get(validator.check([field, value], cmd), field);
  }

  async function getMode(): Promise<ModeReading> {
    const mode = ScpiParser.parseKeyword(await transport.query('SOUR:FUNC:MODE?'), MODE_NAMES);
    status.mode = isLaserMode(mode) ? mode : null;
    return mode;
  }

  async function setOutput(enabled: boolean | string | number): Promise<SetStatus> {
    return applyEnable(checked('enable', enabled, 'enableLaser'));
  }

  async function setMode(mode: string): Promise<SetStatus> {
    return applyMode(checked('mode', mode, 'setMode'));
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

    async disconnect(): Promise<Result<void, Error>> {
      return transport.close();
    },

    async reset(): Promise<Result<void, Error>> {
      const result = await command('*RST');
      if (!result.ok) return result;
      // Allow time for reset
      await delay(RESET_SETTLE_MS);
      status.outputEnabled = false;
      status.mode = null;
      return Ok(undefined);
    },

    async clear(): Promise<Result<void, Error>> {
      return command('*CLS');
    },

    async lock(): Promise<Result<void, Error>> {
      return command('SYST:LOCK ON');
    },

    async unlock(): Promise<Result<void, Error>> {
      return command('SYST:LOCK OFF');
    },

    async getId(): Promise<string> {
      return queryText('*IDN?');
    },

    async getError(): Promise<string> {
      return queryText('SYST:ERR?');
    },

    enableLaser: () => setOutput(true),
    disableLaser: () => setOutput(false),
    setOutput,

    async isLaserEnabled(): Promise<boolean> {
      return ScpiParser.parseBoolResult(await transport.query('OUTP?'));
    },

    setCurrent: milliamps => applyNumber(SETTINGS.current, checked('current', milliamps, 'setCurrent')),
    getCurrent: () => queryScaled(SETTINGS.current),
    getMeasuredCurrent: () => queryScaled(SETTINGS.current, 'MEAS:CURR?'),
    setCurrentLimit: milliamps => applyNumber(SETTINGS.currentLimit, checked('limit', milliamps, 'setCurrentLimit')),
    getCurrentLimit: () => queryScaled(SETTINGS.currentLimit),

    setPower: milliwatts => applyNumber(SETTINGS.power, checked('power', milliwatts, 'setPower')),
    getPower: () => queryScaled(SETTINGS.power),
    getMeasuredPower: () => queryScaled(SETTINGS.power, 'MEAS:POW?'),
    setPowerLimit: milliwatts => applyNumber(SETTINGS.powerLimit, checked('limit', milliwatts, 'setPowerLimit')),
    getPowerLimit: () => queryScaled(SETTINGS.powerLimit),

    getTemperature: () => queryNumber('MEAS:TEMP?'),
    getTECCurrent: () => queryNumber('MEAS:TEC:CURR?'),
    setTempLimitLow: celsius => applyNumber(SETTINGS.tempLimitLow, checked('temperature', celsius, 'setTempLimitLow')),
    getTempLimitLow: () => queryNumber(SETTINGS.tempLimitLow.query),
    setTempLimitHigh: celsius => applyNumber(SETTINGS.tempLimitHigh, checked('temperature', celsius, 'setTempLimitHigh')),
    getTempLimitHigh: () => queryNumber(SETTINGS.tempLimitHigh.query),

    setMode,
    setModeConstantCurrent: () => setMode('CURR'),
    setModeConstantPower: () => setMode('POW'),
    getMode,

    getStatusByte: () => queryNumber('*STB?'),

    // Safety conditions are never assumed to hold when the query fails
    async isInterlockClosed(): Promise<boolean> {
      return ScpiParser.parseBoolResult(await transport.query('SYST:INTL?'));
    },

    async isOverTemp(): Promise<boolean> {
      return ScpiParser.parseBoolResult(await transport.query('SYST:TEMP:PROT?'));
    },

    async configure(...inputs: unknown[]): Promise<ConfigureReport<LaserField>> {
      const set = validator.check(inputs);
      const diagnostics = [...set.diagnostics];

      const appliers: Record<LaserField, (value: string) => Promise<SetStatus>> = {
        current: value => applyNumber(SETTINGS.current, value),
        power: value => applyNumber(SETTINGS.power, value),
        temperature: async () => {
          diagnostics.push('temperature is ambiguous here, use setTempLimitLow or setTempLimitHigh');
          messages.warn('temperature is ambiguous here, use setTempLimitLow or setTempLimitHigh');
          return SetStatus.NotSent;
        },
        mode: applyMode,
        enable: applyEnable,
        limit: applyLimit,
      };

      const statuses: Partial<Record<LaserField, SetStatus>> = {};
      for (const { name, value } of set.params) {
        statuses[name] = await appliers[name](value);
      }
      return { statuses, diagnostics };
    },

    async getStatus(): Promise<DeviceStatus> {
      const output = await transport.query('OUTP?');
      status.outputEnabled = ScpiParser.parseBoolResult(output);
      await getMode();

      const history = errors.history();
      const last = history[history.length - 1];
      if (last) {
        status.lastError = last.description;
      } else {
        delete status.lastError;
      }
      return { ...status };
    },

    readErrors: () => errors.read(),
    errorHistory: () => errors.history(),
    clearErrors: () => errors.clear(),
  };
}
