import { describe, it, expect, beforeEach } from 'vitest';
import { createRotarySimulator, type RotarySimulator } from '../rotary-simulator.js';

describe('RotarySimulator', () => {
  let rotary: RotarySimulator;

  beforeEach(() => {
    rotary = createRotarySimulator({ stepDegrees: 45 });
  });

  describe('Movement', () => {
    it('should step toward the target on each position poll', () => {
      rotary.handleCommand('ROTAtion:ANGLE 100');

      expect(rotary.handleCommand('ROTAtion:POSition?')).toBe('45.000');
      expect(rotary.handleCommand('ROTAtion:REACHED?')).toBe('0');
      expect(rotary.handleCommand('ROTAtion:POSition?')).toBe('90.000');
      expect(rotary.handleCommand('ROTAtion:POSition?')).toBe('100.000');
      expect(rotary.handleCommand('ROTAtion:REACHED?')).toBe('1');
    });

    it('should move in the negative direction', () => {
      rotary.handleCommand('ROTAtion:ANGLE -50');
      rotary.handleCommand('ROTAtion:POSition?');
      expect(rotary.position()).toBe(-45);
      rotary.handleCommand('ROTAtion:POSition?');
      expect(rotary.position()).toBe(-50);
    });

    it('should not move while the voltage lockout is active', () => {
      rotary.setVoltLockout(true);
      rotary.handleCommand('ROTAtion:ANGLE 90');

      expect(rotary.handleCommand('ROTAtion:POSition?')).toBe('0.000');
      expect(rotary.handleCommand('MOTOR:ENABLED?')).toBe('0');
      expect(rotary.handleCommand('MOTOR:VOLTLOCKout?')).toBe('1');
    });

    it('should not move with the local enable off', () => {
      rotary.handleCommand('MOTOR:ENABLELOCal 0');
      rotary.handleCommand('ROTAtion:ANGLE 90');

      expect(rotary.handleCommand('MOTOR:ENABLELOCal?')).toBe('0');
      expect(rotary.handleCommand('ROTAtion:POSition?')).toBe('0.000');
    });
  });

  describe('Limits', () => {
    it('should reject a target outside the limits', () => {
      rotary.handleCommand('ROTAtion:LIMit:UPPer 45');
      rotary.handleCommand('ROTAtion:ANGLE 90');

      expect(rotary.handleCommand('ROTAtion:LIMit:UPPer?')).toBe('45.000');
      expect(rotary.handleCommand('ROTAtion:ANGLE?')).toBe('0.000');
      expect(rotary.handleCommand('SYSTem:ERRor?')).toBe('-222,"Data out of range"');
    });

    it('should reject more than a full turn', () => {
      rotary.handleCommand('ROTAtion:ANGLE 400');
      expect(rotary.handleCommand('SYSTem:ERRor?')).toBe('-222,"Data out of range"');
    });

    it('should reject a non-numeric angle', () => {
      rotary.handleCommand('ROTAtion:ANGLE abc');
      expect(rotary.handleCommand('SYSTem:ERRor?')).toBe('-104,"Data type error"');
    });
  });

  describe('System', () => {
    it('should lock and unlock the local controls', () => {
      rotary.handleCommand('SYSTem:LOCal:LOCK');
      expect(rotary.handleCommand('SYSTem:LOCal:LOCK?')).toBe('1');
      rotary.handleCommand('SYSTem:LOCal:UNLock');
      expect(rotary.handleCommand('SYSTem:LOCal:LOCK?')).toBe('0');
    });

    it('should log unknown headers and clear them on *CLS', () => {
      expect(rotary.handleCommand('FOO')).toBeNull();
      expect(rotary.handleCommand('SYSTem:ERRor?')).toBe('-113,"Undefined header"');

      rotary.handleCommand('FOO');
      rotary.handleCommand('*CLS');
      expect(rotary.handleCommand('SYSTem:ERRor?')).toBe('0,"No error"');
    });
  });
});
