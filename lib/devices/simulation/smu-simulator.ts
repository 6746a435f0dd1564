/**
 * SMU Simulator
 * Simulates the Keithley 2450 SCPI command subset used by the driver
 *
 * Settings live in a store keyed by the upper-cased command path, so
 * ':Source:voltage:Range 1.5' and ':SOURCE:VOLTAGE:RANGE?' address the same
 * entry. Ranges snap to the next hardware range, unknown headers are
 * logged to the event log.
 */

export interface SmuSimulator {
  handleCommand(cmd: string): string | null;
  /** Current value of a setting, by upper-cased path */
  setting(path: string): string | undefined;
  /** Number of beeps requested */
  beeps(): number;
}

export interface SmuSimulatorConfig {
  /** Clock for event-log timestamps */
  now?: () => Date;
  identity?: string;
}

const SOURCE_MODES = ['VOLTAGE', 'CURRENT'] as const;
const SENSE_MODES = ['VOLTAGE', 'CURRENT', 'RESISTANCE'] as const;

// Hardware ranges, ascending
const RANGES: Record<string, readonly number[]> = {
  VOLTAGE: [0.02, 0.2, 2, 20, 200],
  CURRENT: [1e-8, 1e-7, 1e-6, 1e-5, 1e-4, 1e-3, 1e-2, 1e-1, 1],
  RESISTANCE: [2, 20, 200, 2e3, 2e4, 2e5, 2e6, 2e7, 2e8],
};

const FLAG_PATH = /:(READ:BACK|AUTO|STATE|CAP|REBOUND|RSENSE|OCOMPENSATED|TRIPPED)$/;
const RANGE_PATH = /^:(SOURCE|SENSE):(VOLTAGE|CURRENT|RESISTANCE):RANGE$/;

const SENSE_FUNCTIONS: Record<string, string> = {
  VOLTAGE: '"VOLT:DC"', VOLT: '"VOLT:DC"', 'VOLT:DC': '"VOLT:DC"',
  CURRENT: '"CURR:DC"', CURR: '"CURR:DC"', 'CURR:DC': '"CURR:DC"',
  RESISTANCE: '"RES"', RES: '"RES"',
};

const SOURCE_FUNCTIONS: Record<string, string> = {
  VOLTAGE: 'VOLT', VOLT: 'VOLT', CURRENT: 'CURR', CURR: 'CURR',
};

const TERMINALS: Record<string, string> = { FRONT: 'FRON', FRON: 'FRON', REAR: 'REAR' };

const ON_TOKENS = new Set(['1', 'ON', 'TRUE', 'YES']);

/** Snap to the smallest hardware range that holds the value */
export function snapRange(mode: string, value: number): number {
  const ranges = RANGES[mode] ?? [];
  const magnitude = Math.abs(value);
  return ranges.find(r => r >= magnitude * (1 - 1e-9)) ?? ranges[ranges.length - 1] ?? value;
}

/** Device number format, e.g. 2.000000E+00 */
export function formatReading(value: number): string {
  return value.toExponential(6).toUpperCase();
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function eventTime(date: Date): string {
  return `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

function initialSettings(): Map<string, string> {
  const settings = new Map<string, string>([
    [':OUTPUT:STATE', '0'],
    [':OUTPUT:INTERLOCK:STATE', '0'],
    [':OUTPUT:INTERLOCK:TRIPPED', '0'],
    [':SOURCE:VOLTAGE:PROTECTION:LEVEL', 'NONE'],
    [':SOURCE:VOLTAGE:PROTECTION:TRIPPED', '0'],
    [':SOURCE:FUNCTION', 'VOLT'],
    [':SENSE:FUNCTION', '"CURR:DC"'],
    [':ROUTE:TERMINALS', 'FRON'],
    [':SYSTEM:LFREQUENCY', '50'],
    [':DISPLAY:BUFFER:ACTIVE', 'DEFBUFFER1'],
  ]);

  for (const mode of SOURCE_MODES) {
    const limit = mode === 'VOLTAGE' ? 'ILIMIT' : 'VLIMIT';
    settings.set(`:SOURCE:${mode}:LEVEL:AMPLITUDE`, formatReading(0));
    settings.set(`:SOURCE:${mode}:READ:BACK`, '1');
    settings.set(`:SOURCE:${mode}:RANGE`, formatReading(mode === 'VOLTAGE' ? 2 : 1e-4));
    settings.set(`:SOURCE:${mode}:RANGE:AUTO`, '1');
    settings.set(`:OUTPUT:${mode}:SMODE`, 'NORM');
    settings.set(`:SOURCE:${mode}:${limit}`, formatReading(mode === 'VOLTAGE' ? 1.05e-4 : 21));
    settings.set(`:SOURCE:${mode}:${limit}:TRIPPED`, '0');
    settings.set(`:SOURCE:${mode}:DELAY`, formatReading(0));
    settings.set(`:SOURCE:${mode}:DELAY:AUTO`, '1');
    settings.set(`:SOURCE:${mode}:HIGH:CAP`, '0');
  }

  for (const mode of SENSE_MODES) {
    const unit = mode === 'VOLTAGE' ? 'VOLT' : mode === 'CURRENT' ? 'AMP' : 'OHM';
    const ranges = RANGES[mode];
    settings.set(`:SENSE:${mode}:UNIT`, unit);
    settings.set(`:SENSE:${mode}:RANGE`, formatReading(ranges[ranges.length - 1]));
    settings.set(`:SENSE:${mode}:RANGE:AUTO`, '1');
    settings.set(`:SENSE:${mode}:RANGE:AUTO:LLIMIT`, formatReading(ranges[0]));
    settings.set(`:SENSE:${mode}:RANGE:AUTO:ULIMIT`, formatReading(ranges[ranges.length - 1]));
    settings.set(`:SENSE:${mode}:RANGE:AUTO:REBOUND`, '0');
    settings.set(`:SENSE:${mode}:NPLCYCLES`, formatReading(1));
    settings.set(`:SENSE:${mode}:AVERAGE:STATE`, '0');
    settings.set(`:SENSE:${mode}:AVERAGE:COUNT`, '10');
    settings.set(`:SENSE:${mode}:AVERAGE:TCONTROL`, 'REP');
    settings.set(`:SENSE:${mode}:RSENSE`, '0');
    settings.set(`:SENSE:${mode}:AZERO:STATE`, '1');
    settings.set(`:SENSE:${mode}:OCOMPENSATED`, '0');
  }
  return settings;
}

export function createSmuSimulator(config: SmuSimulatorConfig = {}): SmuSimulator {
  const { now = () => new Date(), identity = 'KEITHLEY INSTRUMENTS,MODEL 2450,04000000,1.7.0' } = config;

  let settings = initialSettings();
  const events: string[] = [];
  let triggerState = 'idle;idle;1';
  let beepCount = 0;

  function logEvent(code: number, description: string): void {
    events.push(`${code},"${description};1;${eventTime(now())}"`);
  }

  function store(path: string, arg: string): void {
    const current = settings.get(path);
    if (current === undefined) {
      logEvent(-113, 'Undefined header');
      return;
    }

    if (FLAG_PATH.test(path)) {
      settings.set(path, ON_TOKENS.has(arg) ? '1' : '0');
      return;
    }

    const value = Number(arg);
    if (arg === '' || !Number.isFinite(value)) {
      // Keyword settings keep the token as sent
      settings.set(path, arg);
      return;
    }

    const range = RANGE_PATH.exec(path);
    settings.set(path, formatReading(range ? snapRange(range[2], value) : value));
  }

  function write(head: string, arg: string): void {
    switch (head) {
      case '*RST':
        settings = initialSettings();
        triggerState = 'idle;idle;1';
        return;
      case '*CLS':
      case ':SYSTEM:CLEAR':
        events.length = 0;
        return;
      case ':OUTP':
        settings.set(':OUTPUT:STATE', ON_TOKENS.has(arg) ? '1' : '0');
        return;
      case ':SOURCE:FUNCTION': {
        const fn = SOURCE_FUNCTIONS[arg];
        if (fn) settings.set(':SOURCE:FUNCTION', fn);
        else logEvent(-224, 'Illegal parameter value');
        return;
      }
      case ':SENSE:FUNCTION': {
        const fn = SENSE_FUNCTIONS[arg.replace(/"/g, '')];
        if (fn) settings.set(':SENSE:FUNCTION', fn);
        else logEvent(-224, 'Illegal parameter value');
        return;
      }
      case ':ROUTE:TERMINALS': {
        const side = TERMINALS[arg];
        if (side) settings.set(':ROUTE:TERMINALS', side);
        else logEvent(-224, 'Illegal parameter value');
        return;
      }
      case ':SYSTEM:BEEPER':
        beepCount++;
        return;
      case ':TRIGGER:CONTINUOUS':
        triggerState = 'running;running;1';
        return;
      case ':ABORT':
        triggerState = 'aborted;aborted;1';
        return;
      case ':SENSE:AZERO:ONCE':
        return;
      default:
        store(head, arg);
    }
  }

  function query(head: string): string {
    switch (head) {
      case '*IDN?':
        return identity;
      case '*OPC?':
        return '1';
      case ':TRIGGER:STATE?':
        return triggerState;
      case ':SYSTEM:EVENTLOG:COUNT?':
        return String(events.length);
      case ':SYSTEM:EVENTLOG:NEXT?':
        return events.shift() ?? '0,"No error;0;1970/01/01 00:00:00.000"';
    }
    const value = settings.get(head.slice(0, -1));
    if (value === undefined) {
      logEvent(-113, 'Undefined header');
      return '';
    }
    return value;
  }

  // Parse a command and return response (or null for write commands)
  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim().toUpperCase();
    const space = trimmed.indexOf(' ');
    const head = space < 0 ? trimmed : trimmed.slice(0, space);
    const arg = space < 0 ? '' : trimmed.slice(space + 1).trim();

    if (head.endsWith('?')) return query(head);
    write(head, arg);
    return null;
  }

  return {
    handleCommand,
    setting: path => settings.get(path),
    beeps: () => beepCount,
  };
}
