/**
 * Simulation Module
 * Creates simulated instruments using real drivers with simulated transports
 *
 * Usage:
 *   const { laser, smu, rotary } = createSimulatedInstruments();
 *
 * Configuration via environment variables:
 *   SIM_LATENCY_MS        - Command latency (default: 20ms)
 *   SIM_LATENCY_JITTER_MS - Latency jitter (default: 5ms)
 *   SIM_ROTARY_STEP_DEG   - Platform movement per position poll (default: 30)
 */

import { createSimulatedTransport } from './simulated-transport.js';
import { createLaserSimulator, type LaserSimulator } from './laser-simulator.js';
import { createSmuSimulator, type SmuSimulator } from './smu-simulator.js';
import { createRotarySimulator, type RotarySimulator } from './rotary-simulator.js';
import { createComboSource6301, type ComboSource6301 } from '../drivers/combo-source-6301.js';
import { createKeithley2450, type Keithley2450 } from '../drivers/keithley-2450.js';
import { createRotaryPlatform, type RotaryPlatform } from '../drivers/rotary-platform.js';
import type { DriverOptions } from '../driver-support.js';

export interface SimulatedInstrumentsConfig {
  latencyMs?: number;
  latencyJitterMs?: number;
  rotaryStepDegrees?: number;
  /** Passed to every driver */
  driverOptions?: DriverOptions;
}

export interface SimulatedInstruments {
  laser: ComboSource6301;
  smu: Keithley2450;
  rotary: RotaryPlatform;
  simulators: {
    laser: LaserSimulator;
    smu: SmuSimulator;
    rotary: RotarySimulator;
  };
}

/**
 * Load configuration from environment variables with defaults.
 */
function loadSimulationConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Required<Omit<SimulatedInstrumentsConfig, 'driverOptions'>> {
  const parseFloat = (envVar: string | undefined, defaultVal: number): number => {
    if (!envVar) return defaultVal;
    const parsed = Number.parseFloat(envVar);
    return Number.isNaN(parsed) ? defaultVal : parsed;
  };

  return {
    latencyMs: parseFloat(env.SIM_LATENCY_MS, 20),
    latencyJitterMs: parseFloat(env.SIM_LATENCY_JITTER_MS, 5),
    rotaryStepDegrees: parseFloat(env.SIM_ROTARY_STEP_DEG, 30),
  };
}

/**
 * Create the three instruments on simulated transports.
 * The drivers work unchanged; they just talk to a different transport.
 */
export function createSimulatedInstruments(config: SimulatedInstrumentsConfig = {}): SimulatedInstruments {
  const env = loadSimulationConfigFromEnv();
  const transportConfig = {
    latencyMs: config.latencyMs ?? env.latencyMs,
    jitterMs: config.latencyJitterMs ?? env.latencyJitterMs,
  };
  const { driverOptions = {} } = config;

  const simulators = {
    laser: createLaserSimulator(),
    smu: createSmuSimulator(),
    rotary: createRotarySimulator({ stepDegrees: config.rotaryStepDegrees ?? env.rotaryStepDegrees }),
  };

  return {
    laser: createComboSource6301(
      createSimulatedTransport(cmd => simulators.laser.handleCommand(cmd), transportConfig),
      driverOptions
    ),
    smu: createKeithley2450(
      createSimulatedTransport(cmd => simulators.smu.handleCommand(cmd), transportConfig),
      { triggerSettleMs: 0, ...driverOptions }
    ),
    rotary: createRotaryPlatform(
      createSimulatedTransport(cmd => simulators.rotary.handleCommand(cmd), transportConfig),
      driverOptions
    ),
    simulators,
  };
}

export { createSimulatedTransport } from './simulated-transport.js';
export type { LaserSimulator } from './laser-simulator.js';
export type { SmuSimulator } from './smu-simulator.js';
export type { RotarySimulator } from './rotary-simulator.js';
