/**
 * Test harness to verify device drivers work with real hardware
 * Read-only operations - no setting values
 *
 * Ports come from LASER_PORT and ROTARY_PORT; the SMU is found on USB.
 */

import { loadConfigFromEnv } from './lib/config.js';
import { createUSBTMCTransport, findUSBTMCDevice } from './lib/devices/transports/usbtmc.js';
import { createSerialTransport } from './lib/devices/transports/serial.js';
import { createComboSource6301 } from './lib/devices/drivers/combo-source-6301.js';
import {
  createKeithley2450,
  KEITHLEY_VENDOR_ID,
  KEITHLEY_2450_PRODUCT_ID,
} from './lib/devices/drivers/keithley-2450.js';
import { createRotaryPlatform, rotarySerialConfig } from './lib/devices/drivers/rotary-platform.js';

const config = loadConfigFromEnv();

async function testLaser() {
  console.log('\n=== Testing ComboSource 6301 ===');

  if (!config.laserPort) {
    console.log('LASER_PORT not set, skipping');
    return;
  }

  const transport = createSerialTransport({
    path: config.laserPort,
    baudRate: config.baudRate,
    terminator: '\n',
    commandDelay: config.commandDelayMs,
    timeout: config.timeoutMs,
  });
  const laser = createComboSource6301(transport, { config });

  const connected = await laser.connect();
  if (!connected.ok) {
    console.log('Connect failed:', connected.error.message);
    return;
  }

  console.log('Identity:', await laser.getId());
  const status = await laser.getStatus();
  console.log('Status:');
  console.log('  Mode:', status.mode);
  console.log('  Output enabled:', status.outputEnabled);
  console.log('  Interlock closed:', await laser.isInterlockClosed());
  console.log('  Over temperature:', await laser.isOverTemp());
  console.log('Setpoints:');
  console.log('  Current:', (await laser.getCurrent()).toFixed(3), 'mA');
  console.log('  Current limit:', (await laser.getCurrentLimit()).toFixed(3), 'mA');
  console.log('  Power:', (await laser.getPower()).toFixed(3), 'mW');
  console.log('Measurements:');
  console.log('  Current:', (await laser.getMeasuredCurrent()).toFixed(3), 'mA');
  console.log('  Power:', (await laser.getMeasuredPower()).toFixed(3), 'mW');
  console.log('  Temperature:', (await laser.getTemperature()).toFixed(3), 'C');

  const errors = await laser.readErrors();
  console.log('Errors:', errors.length === 0 ? 'none' : errors.map(e => `${e.code} ${e.description}`));

  await laser.disconnect();
  console.log('Disconnected');
}

async function testSmu() {
  console.log('\n=== Testing Keithley 2450 ===');

  const device = findUSBTMCDevice(KEITHLEY_VENDOR_ID, KEITHLEY_2450_PRODUCT_ID);
  if (!device) {
    console.log('Keithley 2450 not found');
    return;
  }

  console.log('Found Keithley USB device');

  const smu = createKeithley2450(createUSBTMCTransport(device, { timeout: config.timeoutMs }), { config });

  // connect() switches the output off, the only write this harness makes
  const connected = await smu.connect();
  if (!connected.ok) {
    console.log('Connect failed:', connected.error.message);
    return;
  }

  console.log('Identity:', await smu.getId());
  await smu.describeSettings();

  const errors = await smu.readErrors();
  console.log('Events:', errors.length === 0 ? 'none' : errors.map(e => `${e.code} ${e.severity}: ${e.description}`));

  await smu.disconnect();
  console.log('Disconnected');
}

async function testRotary() {
  console.log('\n=== Testing Rotary Platform ===');

  if (!config.rotaryPort) {
    console.log('ROTARY_PORT not set, skipping');
    return;
  }

  const rotary = createRotaryPlatform(
    createSerialTransport(rotarySerialConfig(config.rotaryPort, config.commandDelayMs)),
    { config }
  );

  const connected = await rotary.connect();
  if (!connected.ok) {
    console.log('Connect failed:', connected.error.message);
    return;
  }

  console.log('Identity:', await rotary.getId());
  console.log('Position:', await rotary.getPosition(), 'deg');
  console.log('Target:', await rotary.getTargetAngle(), 'deg');
  console.log('Limits:', await rotary.getLowerLimit(), '...', await rotary.getUpperLimit(), 'deg');
  console.log('Motor enabled:', await rotary.isMotorEnabled());
  console.log('Voltage lockout:', await rotary.isMotorVoltLockout());
  console.log('Local lock:', await rotary.isLocked());

  await rotary.disconnect();
  console.log('Disconnected');
}

async function main() {
  console.log('Device Driver Test Harness');
  console.log('==========================');

  await testLaser();
  await testSmu();
  await testRotary();

  console.log('\nDone!');
  process.exit(0);
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
