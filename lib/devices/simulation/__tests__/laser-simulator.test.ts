import { describe, it, expect, beforeEach } from 'vitest';
import { createLaserSimulator, type LaserSimulator } from '../laser-simulator.js';

describe('LaserSimulator', () => {
  let laser: LaserSimulator;

  beforeEach(() => {
    laser = createLaserSimulator();
  });

  it('should identify itself', () => {
    expect(laser.handleCommand('*IDN?')).toBe('ComboSource,6301,SIM00001,1.0');
  });

  describe('Setpoints', () => {
    it('should start at zero current', () => {
      expect(laser.handleCommand('SOUR:CURR?')).toBe('0.000000');
    });

    it('should set current case-insensitively', () => {
      laser.handleCommand('sour:curr 0.1');
      expect(laser.handleCommand('SOUR:CURR?')).toBe('0.100000');
    });

    it('should clamp current to the limit', () => {
      laser.handleCommand('SOUR:CURR 0.9');
      expect(laser.handleCommand('SOUR:CURR?')).toBe('0.500000');
    });

    it('should pull the current down when the limit drops', () => {
      laser.handleCommand('SOUR:CURR 0.1');
      laser.handleCommand('SOUR:CURR:LIM 0.05');
      expect(laser.handleCommand('SOUR:CURR?')).toBe('0.050000');
    });

    it('should clamp power to the limit', () => {
      laser.handleCommand('SOUR:POW 0.5');
      expect(laser.handleCommand('SOUR:POW?')).toBe('0.100000');
    });

    it('should report temperature limits with millidegree resolution', () => {
      laser.handleCommand('SOUR:TEMP:LIM:HIGH 30.5');
      expect(laser.handleCommand('SOUR:TEMP:LIM:HIGH?')).toBe('30.500');
      expect(laser.handleCommand('SOUR:TEMP:LIM:LOW?')).toBe('15.000');
    });
  });

  describe('Output', () => {
    it('should not emit with the output off', () => {
      laser.handleCommand('SOUR:CURR 0.1');
      expect(laser.handleCommand('MEAS:CURR?')).toBe('0.000000');
      expect(laser.handleCommand('MEAS:TEC:CURR?')).toBe('0.050000');
    });

    it('should drive the setpoint current in current mode', () => {
      laser.handleCommand('SOUR:CURR 0.1');
      laser.handleCommand('OUTP ON');

      expect(laser.handleCommand('OUTP?')).toBe('1');
      expect(laser.handleCommand('MEAS:CURR?')).toBe('0.100000');
      expect(laser.handleCommand('MEAS:POW?')).toBe('0.064000');
    });

    it('should keep the output off with an open interlock', () => {
      laser.setInterlockClosed(false);
      laser.handleCommand('OUTP ON');

      expect(laser.handleCommand('SYST:INTL?')).toBe('0');
      expect(laser.handleCommand('OUTP?')).toBe('0');
    });

    it('should drop the output when the interlock opens', () => {
      laser.handleCommand('OUTP ON');
      laser.setInterlockClosed(false);
      expect(laser.handleCommand('OUTP?')).toBe('0');
    });

    it('should stop emitting outside the temperature window', () => {
      laser.handleCommand('SOUR:CURR 0.1');
      laser.handleCommand('OUTP ON');
      laser.setTemperature(10);

      expect(laser.handleCommand('SYST:TEMP:PROT?')).toBe('1');
      expect(laser.handleCommand('MEAS:TEMP?')).toBe('10.000');
      expect(laser.handleCommand('MEAS:CURR?')).toBe('0.000000');
    });
  });

  describe('Mode', () => {
    it('should switch to power mode', () => {
      laser.handleCommand('SOUR:FUNC:MODE POW');
      expect(laser.handleCommand('SOUR:FUNC:MODE?')).toBe('POW');
    });

    it('should reject an unknown mode', () => {
      laser.handleCommand('SOUR:FUNC:MODE FOO');
      expect(laser.handleCommand('SOUR:FUNC:MODE?')).toBe('CURR');
      expect(laser.handleCommand('SYST:ERR?')).toBe('-224,"Illegal parameter value"');
    });
  });

  describe('Error queue', () => {
    it('should report no error when empty', () => {
      expect(laser.handleCommand('SYST:ERR?')).toBe('0,"No error"');
      expect(laser.handleCommand('*STB?')).toBe('0');
    });

    it('should queue errors in order', () => {
      laser.handleCommand('SOUR:CURR abc');
      laser.handleCommand('FOO?');

      expect(laser.handleCommand('*STB?')).toBe('4');
      expect(laser.handleCommand('SYST:ERR?')).toBe('-104,"Data type error"');
      expect(laser.handleCommand('SYST:ERR?')).toBe('-113,"Undefined header"');
      expect(laser.handleCommand('SYST:ERR?')).toBe('0,"No error"');
    });

    it('should answer an unknown query with an empty line', () => {
      expect(laser.handleCommand('FOO?')).toBe('');
    });

    it('should clear the queue on *CLS', () => {
      laser.handleCommand('BOGUS');
      laser.handleCommand('*CLS');
      expect(laser.handleCommand('SYST:ERR?')).toBe('0,"No error"');
    });
  });

  it('should restore defaults on *RST', () => {
    laser.handleCommand('SOUR:CURR 0.2');
    laser.handleCommand('OUTP ON');
    laser.handleCommand('*RST');

    expect(laser.handleCommand('SOUR:CURR?')).toBe('0.000000');
    expect(laser.handleCommand('OUTP?')).toBe('0');
  });

  it('should track the front panel lock', () => {
    laser.handleCommand('SYST:LOCK ON');
    expect(laser.isLocked()).toBe(true);
    laser.handleCommand('SYST:LOCK OFF');
    expect(laser.isLocked()).toBe(false);
  });
});
