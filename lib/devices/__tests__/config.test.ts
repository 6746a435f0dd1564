import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFromEnv, parseVerbosity } from '../../config.js';

describe('Configuration', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads numeric overrides', () => {
    const config = loadConfigFromEnv({
      SCPI_BAUD_RATE: '9600',
      SCPI_READBACK_TOLERANCE: '0.005',
      SCPI_ERROR_QUEUE_MAX_READS: '4.4',
    });
    expect(config.baudRate).toBe(9600);
    expect(config.readbackTolerance).toBe(0.005);
    expect(config.errorQueueMaxReads).toBe(4);
  });

  it('falls back to defaults for invalid numbers', () => {
    const config = loadConfigFromEnv({ SCPI_TIMEOUT_MS: 'soon', SCPI_ERROR_QUEUE_MAX_READS: '0' });
    expect(config.timeoutMs).toBe(2000);
    expect(config.errorQueueMaxReads).toBe(10);
  });

  it('reads the harness port paths', () => {
    const config = loadConfigFromEnv({ LASER_PORT: '/dev/ttyUSB0', ROTARY_PORT: '' });
    expect(config.laserPort).toBe('/dev/ttyUSB0');
    expect(config.rotaryPort).toBeUndefined();
  });

  describe('parseVerbosity', () => {
    it('accepts the three levels in any case', () => {
      expect(parseVerbosity('ALL', 'few')).toBe('all');
      expect(parseVerbosity(' none ', 'few')).toBe('none');
    });

    it('falls back for unknown levels', () => {
      expect(parseVerbosity('loud', 'few')).toBe('few');
      expect(parseVerbosity(undefined, 'all')).toBe('all');
    });
  });
});
