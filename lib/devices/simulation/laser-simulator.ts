/**
 * Laser Simulator
 * Simulates the ComboSource 6301 laser diode controller SCPI command set
 *
 * Command set:
 * - SOUR:CURR? / SOUR:CURR <A>             - Current setpoint (clamped to the limit)
 * - SOUR:POW? / SOUR:POW <W>               - Power setpoint (clamped to the limit)
 * - SOUR:CURR:LIM, SOUR:POW:LIM            - Limits
 * - SOUR:TEMP:LIM:LOW, SOUR:TEMP:LIM:HIGH  - Temperature window
 * - SOUR:FUNC:MODE? / SOUR:FUNC:MODE CURR|POW
 * - OUTP? / OUTP ON|OFF
 * - MEAS:CURR?, MEAS:POW?, MEAS:TEMP?, MEAS:TEC:CURR?
 * - SYST:INTL?, SYST:TEMP:PROT?, SYST:LOCK ON|OFF, SYST:ERR?
 * - *IDN?, *RST, *CLS, *STB?
 */

export interface LaserSimulator {
  handleCommand(cmd: string): string | null;
  /** Open the interlock loop; the output drops and stays off */
  setInterlockClosed(closed: boolean): void;
  setTemperature(celsius: number): void;
  isLocked(): boolean;
}

// Diode model: no light below threshold, linear above
const THRESHOLD_A = 0.02;
const SLOPE_W_PER_A = 0.8;

const IDENTITY = 'ComboSource,6301,SIM00001,1.0';

interface LaserState {
  current: number;
  currentLimit: number;
  power: number;
  powerLimit: number;
  tempLow: number;
  tempHigh: number;
  mode: 'CURR' | 'POW';
  output: boolean;
  locked: boolean;
}

function initialState(): LaserState {
  return {
    current: 0,
    currentLimit: 0.5,
    power: 0,
    powerLimit: 0.1,
    tempLow: 15,
    tempHigh: 35,
    mode: 'CURR',
    output: false,
    locked: false,
  };
}

export function createLaserSimulator(): LaserSimulator {
  let state = initialState();
  let temperature = 25;
  let interlockClosed = true;
  const errors: string[] = [];

  const overTemp = () => temperature < state.tempLow || temperature > state.tempHigh;
  const emitting = () => state.output && interlockClosed && !overTemp();

  function diodeCurrent(): number {
    if (!emitting()) return 0;
    if (state.mode === 'CURR') return state.current;
    return Math.min(state.power / SLOPE_W_PER_A + THRESHOLD_A, state.currentLimit);
  }

  function opticalPower(): number {
    return Math.max(0, diodeCurrent() - THRESHOLD_A) * SLOPE_W_PER_A;
  }

  function parseArg(arg: string): number | null {
    const value = Number(arg);
    if (arg === '' || !Number.isFinite(value)) {
      errors.push('-104,"Data type error"');
      return null;
    }
    return value;
  }

  const numeric = (value: number) => value.toFixed(6);

  const queries: Record<string, () => string> = {
    '*IDN?': () => IDENTITY,
    '*STB?': () => (errors.length > 0 ? '4' : '0'),
    'SOUR:CURR?': () => numeric(state.current),
    'SOUR:CURR:LIM?': () => numeric(state.currentLimit),
    'SOUR:POW?': () => numeric(state.power),
    'SOUR:POW:LIM?': () => numeric(state.powerLimit),
    'SOUR:TEMP:LIM:LOW?': () => state.tempLow.toFixed(3),
    'SOUR:TEMP:LIM:HIGH?': () => state.tempHigh.toFixed(3),
    'SOUR:FUNC:MODE?': () => state.mode,
    'OUTP?': () => (state.output ? '1' : '0'),
    'MEAS:CURR?': () => numeric(diodeCurrent()),
    'MEAS:POW?': () => numeric(opticalPower()),
    'MEAS:TEMP?': () => temperature.toFixed(3),
    'MEAS:TEC:CURR?': () => numeric(emitting() ? 0.05 + diodeCurrent() / 4 : 0.05),
    'SYST:INTL?': () => (interlockClosed ? '1' : '0'),
    'SYST:TEMP:PROT?': () => (overTemp() ? '1' : '0'),
    'SYST:ERR?': () => errors.shift() ?? '0,"No error"',
  };

  const setters: Record<string, (arg: string) => void> = {
    'SOUR:CURR': arg => {
      const value = parseArg(arg);
      if (value !== null) state.current = Math.min(Math.max(value, 0), state.currentLimit);
    },
    'SOUR:CURR:LIM': arg => {
      const value = parseArg(arg);
      if (value === null) return;
      state.currentLimit = Math.max(value, 0);
      state.current = Math.min(state.current, state.currentLimit);
    },
    'SOUR:POW': arg => {
      const value = parseArg(arg);
      if (value !== null) state.power = Math.min(Math.max(value, 0), state.powerLimit);
    },
    'SOUR:POW:LIM': arg => {
      const value = parseArg(arg);
      if (value === null) return;
      state.powerLimit = Math.max(value, 0);
      state.power = Math.min(state.power, state.powerLimit);
    },
    'SOUR:TEMP:LIM:LOW': arg => {
      const value = parseArg(arg);
      if (value !== null) state.tempLow = value;
    },
    'SOUR:TEMP:LIM:HIGH': arg => {
      const value = parseArg(arg);
      if (value !== null) state.tempHigh = value;
    },
    'SOUR:FUNC:MODE': arg => {
      if (arg === 'CURR' || arg === 'POW') {
        state.mode = arg;
      } else {
        errors.push('-224,"Illegal parameter value"');
      }
    },
    'OUTP': arg => {
      const on = arg === 'ON' || arg === '1';
      // Output cannot be switched on with an open interlock
      state.output = on && interlockClosed;
    },
    'SYST:LOCK': arg => {
      state.locked = arg === 'ON' || arg === '1';
    },
  };

  // Parse a command and return response (or null for write commands)
  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim().toUpperCase();

    if (trimmed === '*RST') {
      state = initialState();
      return null;
    }
    if (trimmed === '*CLS') {
      errors.length = 0;
      return null;
    }

    const query = queries[trimmed];
    if (query) return query();

    const space = trimmed.indexOf(' ');
    const head = space < 0 ? trimmed : trimmed.slice(0, space);
    const setter = setters[head];
    if (setter) {
      setter(space < 0 ? '' : trimmed.slice(space + 1).trim());
      return null;
    }

    errors.push('-113,"Undefined header"');
    return trimmed.endsWith('?') ? '' : null;
  }

  return {
    handleCommand,

    setInterlockClosed(closed: boolean): void {
      interlockClosed = closed;
      if (!closed) state.output = false;
    },

    setTemperature(celsius: number): void {
      temperature = celsius;
    },

    isLocked: () => state.locked,
  };
}
