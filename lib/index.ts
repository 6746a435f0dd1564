// Public entry point

export * from './devices/types.js';
export type { ScpiConfig } from './config.js';
export { DEFAULT_CONFIG, loadConfigFromEnv, parseVerbosity } from './config.js';

export type { Messages } from './devices/messages.js';
export { createMessages } from './devices/messages.js';

export type { NumberFormat, CommandTemplate, BuiltCommand, BoolDialect } from './devices/command-builder.js';
export {
  fixed,
  significant,
  clip,
  formatNumber,
  buildCommand,
  buildBoolCommand,
  buildTokenCommand,
  toCallerUnits,
} from './devices/command-builder.js';

export { ScpiParser, UNEXPECTED_RESPONSE } from './devices/scpi-parser.js';

export type {
  FieldShape,
  FieldRule,
  ParamPair,
  ParameterSet,
  ParamValidator,
  ParamValidatorConfig,
} from './devices/param-validator.js';
export { createParamValidator, coerceValue, formatParams } from './devices/param-validator.js';

export type { Tolerances, ReadbackStep, ReadbackOutcome } from './devices/readback.js';
export {
  DEFAULT_TOLERANCES,
  verifyExact,
  verifyToken,
  verifyRelative,
  verifyRange,
  writeAndVerify,
} from './devices/readback.js';

export type { ErrorQueue, ErrorQueueDialect, ErrorQueueOptions } from './devices/error-queue.js';
export {
  createErrorQueue,
  parseScpiError,
  parseEventEntry,
  parseEventTime,
  QUEUE_READ_FAILED,
  EVENT_LOG_READ_FAILED,
} from './devices/error-queue.js';

export type { DriverOptions } from './devices/driver-support.js';

export type { SerialConfig } from './devices/transports/serial.js';
export { createSerialTransport } from './devices/transports/serial.js';
export type { USBTMCConfig } from './devices/transports/usbtmc.js';
export { createUSBTMCTransport, findUSBTMCDevice } from './devices/transports/usbtmc.js';

export type { ComboSource6301, LaserField, SetpointInput, ModeReading } from './devices/drivers/combo-source-6301.js';
export { createComboSource6301, LASER_METADATA } from './devices/drivers/combo-source-6301.js';

export type {
  Keithley2450,
  Keithley2450Options,
  KeywordReading,
  OperationMode,
  Terminals,
} from './devices/drivers/keithley-2450.js';
export {
  createKeithley2450,
  SMU_METADATA,
  KEITHLEY_VENDOR_ID,
  KEITHLEY_2450_PRODUCT_ID,
  DEFAULT_BUFFERS,
} from './devices/drivers/keithley-2450.js';
export type {
  SmuFunction,
  SenseFunction,
  SourceField,
  SenseField,
  ParameterValue,
} from './devices/drivers/keithley-2450-parameters.js';

export type { RotaryPlatform, RotaryField } from './devices/drivers/rotary-platform.js';
export { createRotaryPlatform, rotarySerialConfig, ROTARY_METADATA } from './devices/drivers/rotary-platform.js';

export type {
  SimulatedInstruments,
  SimulatedInstrumentsConfig,
  LaserSimulator,
  SmuSimulator,
  RotarySimulator,
} from './devices/simulation/index.js';
export { createSimulatedInstruments, createSimulatedTransport } from './devices/simulation/index.js';
