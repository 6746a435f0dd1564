/**
 * Rotary Platform Simulator
 *
 * Command set:
 * - ROTAtion:ANGLE? / ROTAtion:ANGLE <deg>  - Target angle (within the limits)
 * - ROTAtion:POSition?                      - Actual angle, moves toward the target on each poll
 * - ROTAtion:REACHED?
 * - ROTAtion:LIMit:UPPer / ROTAtion:LIMit:LOWer
 * - MOTOR:ENABLED?, MOTOR:ENABLELOCal, MOTOR:ENABLEREMote, MOTOR:VOLTLOCKout?
 * - SYSTem:LOCal:LOCK / SYSTem:LOCal:UNLock / SYSTem:LOCal:LOCK?
 * - SYSTem:ERRor?, *IDN?, *CLS
 */

export interface RotarySimulator {
  handleCommand(cmd: string): string | null;
  setVoltLockout(active: boolean): void;
  /** Actual angle without moving the platform */
  position(): number;
}

export interface RotarySimulatorConfig {
  /** Degrees moved per position poll while the motor runs (default: 30) */
  stepDegrees?: number;
}

const IDENTITY = 'HTWD,DT-2025,SIM00001,1.0';
const FULL_TURN = 360;

const ON_TOKENS = new Set(['1', 'ON']);

export function createRotarySimulator(config: RotarySimulatorConfig = {}): RotarySimulator {
  const { stepDegrees = 30 } = config;

  let target = 0;
  let position = 0;
  let upper = FULL_TURN;
  let lower = -FULL_TURN;
  let enableLocal = true;
  let enableRemote = true;
  let voltLockout = false;
  let locked = false;
  const errors: string[] = [];

  const motorEnabled = () => enableLocal && enableRemote && !voltLockout;
  const flag = (value: boolean) => (value ? '1' : '0');
  const angle = (value: number) => value.toFixed(3);

  function advance(): void {
    if (!motorEnabled()) return;
    const remaining = target - position;
    position = Math.abs(remaining) <= stepDegrees ? target : position + Math.sign(remaining) * stepDegrees;
  }

  function parseAngle(arg: string): number | null {
    const value = Number(arg);
    if (arg === '' || !Number.isFinite(value)) {
      errors.push('-104,"Data type error"');
      return null;
    }
    if (Math.abs(value) > FULL_TURN) {
      errors.push('-222,"Data out of range"');
      return null;
    }
    return value;
  }

  const queries: Record<string, () => string> = {
    '*IDN?': () => IDENTITY,
    'SYSTEM:ERROR?': () => errors.shift() ?? '0,"No error"',
    'SYSTEM:LOCAL:LOCK?': () => flag(locked),
    'ROTATION:ANGLE?': () => angle(target),
    'ROTATION:POSITION?': () => {
      advance();
      return angle(position);
    },
    'ROTATION:REACHED?': () => flag(position === target),
    'ROTATION:LIMIT:UPPER?': () => angle(upper),
    'ROTATION:LIMIT:LOWER?': () => angle(lower),
    'MOTOR:ENABLED?': () => flag(motorEnabled()),
    'MOTOR:ENABLELOCAL?': () => flag(enableLocal),
    'MOTOR:ENABLEREMOTE?': () => flag(enableRemote),
    'MOTOR:VOLTLOCKOUT?': () => flag(voltLockout),
  };

  const setters: Record<string, (arg: string) => void> = {
    'ROTATION:ANGLE': arg => {
      const value = parseAngle(arg);
      if (value === null) return;
      if (value > upper || value < lower) {
        errors.push('-222,"Data out of range"');
        return;
      }
      target = value;
    },
    'ROTATION:LIMIT:UPPER': arg => {
      const value = parseAngle(arg);
      if (value !== null) upper = value;
    },
    'ROTATION:LIMIT:LOWER': arg => {
      const value = parseAngle(arg);
      if (value !== null) lower = value;
    },
    'MOTOR:ENABLELOCAL': arg => {
      enableLocal = ON_TOKENS.has(arg);
    },
    'MOTOR:ENABLEREMOTE': arg => {
      enableRemote = ON_TOKENS.has(arg);
    },
  };

  // Parse a command and return response (or null for write commands)
  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim().toUpperCase();

    switch (trimmed) {
      case '*CLS':
        errors.length = 0;
        return null;
      case 'SYSTEM:LOCAL:LOCK':
        locked = true;
        return null;
      case 'SYSTEM:LOCAL:UNLOCK':
        locked = false;
        return null;
    }

    const query = queries[trimmed];
    if (query) return query();

    const space = trimmed.indexOf(' ');
    const setter = space < 0 ? undefined : setters[trimmed.slice(0, space)];
    if (setter) {
      setter(trimmed.slice(space + 1).trim());
      return null;
    }

    errors.push('-113,"Undefined header"');
    return trimmed.endsWith('?') ? '' : null;
  }

  return {
    handleCommand,
    setVoltLockout(active: boolean): void {
      voltLockout = active;
    },
    position: () => position,
  };
}
