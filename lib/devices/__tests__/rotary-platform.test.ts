import { describe, it, expect, beforeEach } from 'vitest';
import { createRotaryPlatform, rotarySerialConfig, type RotaryPlatform } from '../drivers/rotary-platform.js';
import { createSimulatedTransport } from '../simulation/simulated-transport.js';
import { createRotarySimulator, type RotarySimulator } from '../simulation/rotary-simulator.js';
import { createMockTransport } from './mock-transport.js';
import { DEFAULT_CONFIG } from '../../config.js';
import { SetStatus } from '../../../shared/types.js';

const options = { verbosity: 'none', config: DEFAULT_CONFIG } as const;

describe('Rotary Platform Driver', () => {
  describe('with a mock transport', () => {
    it('should send the target angle and read it back', async () => {
      const transport = createMockTransport();
      const platform = createRotaryPlatform(transport, options);
      await platform.connect();

      expect(await platform.setAngle(12.5)).toBe(SetStatus.Verified);
      expect(transport.sentCommands).toEqual(['ROTAtion:ANGLE 12.5', 'ROTAtion:ANGLE?']);
    });

    it('should not send a non-numeric angle', async () => {
      const transport = createMockTransport();
      const platform = createRotaryPlatform(transport, options);
      await platform.connect();

      expect(await platform.setAngle('north')).toBe(SetStatus.NotSent);
      expect(transport.sentCommands).toEqual([]);
    });

    it('should switch the remote motor enable with 1/0', async () => {
      const transport = createMockTransport();
      const platform = createRotaryPlatform(transport, options);
      await platform.connect();

      expect(await platform.setMotorEnableRemote('off')).toBe(SetStatus.Verified);
      expect(transport.sentCommands).toEqual(['MOTOR:ENABLEREMote 0', 'MOTOR:ENABLEREMote?']);
    });
  });

  describe('with the simulator', () => {
    let simulator: RotarySimulator;
    let platform: RotaryPlatform;

    beforeEach(async () => {
      simulator = createRotarySimulator({ stepDegrees: 30 });
      platform = createRotaryPlatform(
        createSimulatedTransport(cmd => simulator.handleCommand(cmd), { latencyMs: 0, jitterMs: 0 }),
        options
      );
      await platform.connect();
    });

    it('should read the identity', async () => {
      expect(await platform.getId()).toBe('HTWD,DT-2025,SIM00001,1.0');
    });

    it('should move toward the target while polled', async () => {
      expect(await platform.setAngle(90)).toBe(SetStatus.Verified);
      expect(await platform.isReached()).toBe(false);

      expect(await platform.getPosition()).toBe(30);
      expect(await platform.getPosition()).toBe(60);
      expect(await platform.getPosition()).toBe(90);
      expect(await platform.isReached()).toBe(true);
      expect(await platform.getTargetAngle()).toBe(90);
    });

    it('should clip the angle to a full turn', async () => {
      expect(await platform.setAngle(400)).toBe(SetStatus.Verified);
      expect(await platform.getTargetAngle()).toBe(360);
    });

    it('should report a mismatch when the angle is outside the limits', async () => {
      expect(await platform.setUpperLimit(45)).toBe(SetStatus.Verified);
      expect(await platform.getUpperLimit()).toBe(45);

      expect(await platform.setAngle(90)).toBe(SetStatus.Mismatch);

      const entries = await platform.readErrors();
      expect(entries.map(e => e.code)).toEqual([-222]);
      expect(entries[0].description).toBe('Data out of range');
    });

    it('should set the lower limit', async () => {
      expect(await platform.setLowerLimit(-90)).toBe(SetStatus.Verified);
      expect(await platform.getLowerLimit()).toBe(-90);
    });

    it('should not move with the remote enable off', async () => {
      expect(await platform.setMotorEnableRemote(false)).toBe(SetStatus.Verified);
      expect(await platform.isMotorEnableRemote()).toBe(false);
      expect(await platform.isMotorEnabled()).toBe(false);

      await platform.setAngle(90);
      expect(await platform.getPosition()).toBe(0);
    });

    it('should report the voltage lockout', async () => {
      simulator.setVoltLockout(true);

      expect(await platform.isMotorVoltLockout()).toBe(true);
      expect(await platform.isMotorEnableLocal()).toBe(true);
      expect(await platform.isMotorEnabled()).toBe(false);
    });

    it('should lock and unlock the local controls', async () => {
      expect((await platform.lockLocal()).ok).toBe(true);
      expect(await platform.isLocked()).toBe(true);
      expect((await platform.unlockLocal()).ok).toBe(true);
      expect(await platform.isLocked()).toBe(false);
    });

    it('should configure several settings by alias', async () => {
      const report = await platform.configure('position', 45, 'lower', -90, 'enableremote', 'on');

      expect(report.statuses).toEqual({
        angle: SetStatus.Verified,
        lowerlimit: SetStatus.Verified,
        remote: SetStatus.Verified,
      });
      expect(report.diagnostics).toEqual([]);
    });

    it('should return the raw error reply', async () => {
      simulator.handleCommand('BOGUS');
      expect(await platform.getError()).toBe('-113,"Undefined header"');
      expect(await platform.getError()).toBe('0,"No error"');
    });

    it('should clear the error queue', async () => {
      simulator.handleCommand('BOGUS');
      await platform.readErrors();

      expect((await platform.clearErrors()).ok).toBe(true);
      expect(platform.errorHistory()).toEqual([]);
    });
  });

  describe('rotarySerialConfig', () => {
    it('should describe the firmware line settings', () => {
      expect(rotarySerialConfig('/dev/ttyACM0')).toEqual({
        path: '/dev/ttyACM0',
        baudRate: 115200,
        terminator: '\r\n',
        echo: true,
        commandDelay: 50,
        timeout: 10000,
      });
    });
  });
});
