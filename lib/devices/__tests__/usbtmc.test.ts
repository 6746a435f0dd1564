import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Device, Interface } from 'usb';

type InCallback = (err: Error | undefined, data?: Buffer) => void;
type OutCallback = (err?: Error) => void;

const fakes = vi.hoisted(() => {
  class FakeInEndpoint {
    transferType = 2; // BULK
    transfer = vi.fn((_length: number, _cb: InCallback) => {});
  }
  class FakeOutEndpoint {
    transferType = 2; // BULK
    transfer = vi.fn((_data: Buffer, _cb: OutCallback) => {});
  }
  return { FakeInEndpoint, FakeOutEndpoint, findByIds: vi.fn() };
});

vi.mock('usb', () => ({
  default: {
    InEndpoint: fakes.FakeInEndpoint,
    OutEndpoint: fakes.FakeOutEndpoint,
    findByIds: fakes.findByIds,
  },
}));

import {
  buildDevDepMsgOut,
  buildRequestDevDepMsgIn,
  parseDevDepMsgIn,
  createTagGenerator,
  createUSBTMCTransport,
  findUSBTMCDevice,
  DEV_DEP_MSG_OUT,
  REQUEST_DEV_DEP_MSG_IN,
} from '../transports/usbtmc.js';
import type { USBTMCConfig } from '../transports/usbtmc.js';

function reply(text: string, endOfMessage = true): Buffer {
  const data = Buffer.from(text, 'ascii');
  const response = Buffer.alloc(12 + data.length);
  response[0] = REQUEST_DEV_DEP_MSG_IN;
  response.writeUInt32LE(data.length, 4);
  response[8] = endOfMessage ? 1 : 0;
  data.copy(response, 12);
  return response;
}

// Endpoints answer every read request with `response`, or `chunks` in turn
function createMockDevice(options: {
  response?: string;
  /** Reply split over several bulk-in transfers */
  chunks?: string[];
  transferInDelay?: number;
  transferInError?: Error;
  transferOutError?: Error;
  openError?: Error;
  claimError?: Error;
} = {}) {
  const written: Buffer[] = [];

  const pending = [...(options.chunks ?? [])];
  const nextReply = (): Buffer => {
    const chunk = pending.shift();
    if (chunk === undefined) return reply(options.response ?? 'OK\r\n');
    return reply(chunk, pending.length === 0);
  };

  const inEndpoint = new fakes.FakeInEndpoint();
  inEndpoint.transfer.mockImplementation((_length, cb) => {
    if (options.transferInError) {
      setTimeout(() => cb(options.transferInError), options.transferInDelay ?? 0);
    } else {
      setTimeout(() => cb(undefined, nextReply()), options.transferInDelay ?? 0);
    }
  });

  const outEndpoint = new fakes.FakeOutEndpoint();
  outEndpoint.transfer.mockImplementation((data, cb) => {
    written.push(data);
    setTimeout(() => cb(options.transferOutError), 0);
  });

  const iface = {
    endpoints: [inEndpoint, outEndpoint],
    isKernelDriverActive: vi.fn(() => false),
    detachKernelDriver: vi.fn(),
    claim: vi.fn(() => {
      if (options.claimError) throw options.claimError;
    }),
    release: vi.fn(),
  };

  const device = {
    interfaces: [iface as unknown as Interface],
    open: vi.fn(() => {
      if (options.openError) throw options.openError;
    }),
    close: vi.fn(),
  };

  return { device: device as unknown as Device, mocks: { device, iface, inEndpoint, outEndpoint }, written };
}

async function openTransport(options: Parameters<typeof createMockDevice>[0] = {}, config?: USBTMCConfig) {
  const mock = createMockDevice(options);
  const transport = createUSBTMCTransport(mock.device, config);
  await transport.open();
  return { transport, ...mock };
}

describe('USB-TMC Protocol', () => {
  describe('buildDevDepMsgOut', () => {
    it('should build a valid DEV_DEP_MSG_OUT packet', () => {
      const buf = buildDevDepMsgOut('*IDN?', 1);

      expect(buf[0]).toBe(DEV_DEP_MSG_OUT);   // MsgID
      expect(buf[1]).toBe(1);                 // bTag
      expect(buf[2]).toBe(0xFE);              // bTagInverse
      expect(buf.readUInt32LE(4)).toBe(5);    // TransferSize
      expect(buf[8]).toBe(0x01);              // EOM
      expect(buf.toString('ascii', 12, 17)).toBe('*IDN?');
    });

    it('should pad to 4-byte boundary', () => {
      expect(buildDevDepMsgOut('*IDN?', 1).length).toBe(20);
      expect(buildDevDepMsgOut('A', 1).length).toBe(16);
      expect(buildDevDepMsgOut('ABCD', 1).length).toBe(16);
    });

    it('should handle max bTag value (255)', () => {
      const buf = buildDevDepMsgOut('X', 255);
      expect(buf[1]).toBe(255);
      expect(buf[2]).toBe(0);
    });
  });

  describe('buildRequestDevDepMsgIn', () => {
    it('should build a 12-byte request with the maximum size', () => {
      const buf = buildRequestDevDepMsgIn(1024, 5);
      expect(buf.length).toBe(12);
      expect(buf[0]).toBe(REQUEST_DEV_DEP_MSG_IN);
      expect(buf[1]).toBe(5);
      expect(buf[2]).toBe(~5 & 0xFF);
      expect(buf.readUInt32LE(4)).toBe(1024);
    });
  });

  describe('parseDevDepMsgIn', () => {
    it('should return the payload and the end-of-message flag', () => {
      expect(parseDevDepMsgIn(reply('KEITHLEY INSTRUMENTS,MODEL 2450\n'))).toEqual({
        ok: true,
        value: { text: 'KEITHLEY INSTRUMENTS,MODEL 2450\n', endOfMessage: true },
      });
      expect(parseDevDepMsgIn(reply('-1.2E-3,', false))).toEqual({
        ok: true,
        value: { text: '-1.2E-3,', endOfMessage: false },
      });
    });

    it('should ignore bytes past the transfer size', () => {
      const response = Buffer.alloc(24);
      response.writeUInt32LE(4, 4);
      Buffer.from('1.5 and padding').copy(response, 12);
      expect(parseDevDepMsgIn(response)).toEqual({ ok: true, value: { text: '1.5 ', endOfMessage: false } });
    });

    it('should reject a truncated header', () => {
      const result = parseDevDepMsgIn(Buffer.alloc(8));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('USBTMC response too short: 8 bytes (need at least 12)');
      }
    });
  });

  describe('createTagGenerator', () => {
    it('should wrap from 255 to 1 (not 0)', () => {
      const nextTag = createTagGenerator();
      expect(nextTag()).toBe(1);
      for (let i = 0; i < 254; i++) nextTag();
      expect(nextTag()).toBe(1);
    });
  });
});

describe('USB-TMC Transport', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('open()', () => {
    it('should open the USB device and claim interface', async () => {
      const { device, mocks } = createMockDevice();
      const transport = createUSBTMCTransport(device);

      const result = await transport.open();

      expect(result.ok).toBe(true);
      expect(mocks.device.open).toHaveBeenCalled();
      expect(mocks.iface.claim).toHaveBeenCalled();
      expect(transport.isOpen()).toBe(true);
    });

    it('should be idempotent when already open', async () => {
      const { transport, mocks } = await openTransport();
      await transport.open();

      expect(mocks.device.open).toHaveBeenCalledTimes(1);
    });

    it('should close device if interface claim fails', async () => {
      const { device, mocks } = createMockDevice({ claimError: new Error('Claim failed') });
      const transport = createUSBTMCTransport(device);

      const result = await transport.open();

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Claim failed');
      expect(mocks.device.close).toHaveBeenCalled();
      expect(transport.isOpen()).toBe(false);
    });

    it('should report an open failure', async () => {
      const { device } = createMockDevice({ openError: new Error('LIBUSB_ERROR_ACCESS') });
      const result = await createUSBTMCTransport(device).open();
      expect(result.ok).toBe(false);
    });
  });

  describe('close()', () => {
    it('should release interface and close device', async () => {
      const { transport, mocks } = await openTransport();
      await transport.close();

      expect(mocks.iface.release).toHaveBeenCalledWith(true);
      expect(mocks.device.close).toHaveBeenCalled();
      expect(transport.isOpen()).toBe(false);
    });

    it('should wait for an in-flight query before closing', async () => {
      const { transport, mocks } = await openTransport({ transferInDelay: 50 });

      const queryPromise = transport.query('TEST');
      const closePromise = transport.close();

      await new Promise(r => setTimeout(r, 10));
      expect(mocks.device.close).not.toHaveBeenCalled();

      expect((await queryPromise).ok).toBe(true);
      await closePromise;
      expect(mocks.device.close).toHaveBeenCalled();
    });
  });

  describe('query()', () => {
    it('should send the command, then the read request', async () => {
      const { transport, written } = await openTransport({ response: '1\n' }, { maxResponse: 256 });

      const result = await transport.query('*OPC?');

      expect(result).toEqual({ ok: true, value: '1' });
      expect(written).toHaveLength(2);
      expect(written[0].toString('ascii', 12, 18)).toBe('*OPC?\n');
      expect(written[1][0]).toBe(REQUEST_DEV_DEP_MSG_IN);
      expect(written[1].readUInt32LE(4)).toBe(256);
    });

    it('should keep requesting until the end-of-message transfer', async () => {
      const { transport, written } = await openTransport({ chunks: ['ABC', 'DEF\n'] });

      const result = await transport.query(':TRAC:DATA? 1,2');

      expect(result).toEqual({ ok: true, value: 'ABCDEF' });
      expect(written.map(buf => buf[0])).toEqual([DEV_DEP_MSG_OUT, REQUEST_DEV_DEP_MSG_IN, REQUEST_DEV_DEP_MSG_IN]);
    });

    it('should time out after the configured duration', async () => {
      const { transport } = await openTransport({ transferInDelay: 500 }, { timeout: 20 });

      const result = await transport.query('*IDN?');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Timeout waiting for USB response after 20ms');
    });

    it('should serialize concurrent queries', async () => {
      const { transport, written } = await openTransport({ transferInDelay: 10 });

      await Promise.all([transport.query('CMD1'), transport.query('CMD2')]);

      const commands = written.map(buf => buf[0] === DEV_DEP_MSG_OUT ? buf.toString('ascii', 12, 17) : 'REQ');
      expect(commands).toEqual(['CMD1\n', 'REQ', 'CMD2\n', 'REQ']);
    });

    it('should fail when not opened', async () => {
      const { device } = createMockDevice();
      const result = await createUSBTMCTransport(device).query('*IDN?');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Device not opened');
    });
  });

  describe('write()', () => {
    it('should send a single DEV_DEP_MSG_OUT', async () => {
      const { transport, written } = await openTransport();

      const result = await transport.write(':OUTP OFF');

      expect(result.ok).toBe(true);
      expect(written).toHaveLength(1);
      expect(written[0].readUInt32LE(4)).toBe(10);
    });
  });

  describe('disconnection detection', () => {
    it('should mark as disconnected on LIBUSB_ERROR_NO_DEVICE', async () => {
      const { transport } = await openTransport({ transferInError: new Error('LIBUSB_ERROR_NO_DEVICE') });

      const result = await transport.query('TEST');

      expect(result.ok).toBe(false);
      expect(transport.isOpen()).toBe(false);
    });

    it('should reject subsequent commands with the stored error', async () => {
      const { transport } = await openTransport({ transferOutError: new Error('LIBUSB_ERROR_IO') });
      await transport.write('TEST');

      const result = await transport.query('TEST2');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('LIBUSB_ERROR_IO');
    });

    it('should keep the connection on non-fatal errors', async () => {
      const { transport } = await openTransport({ transferInError: new Error('LIBUSB_ERROR_TIMEOUT') });

      await transport.query('TEST');

      expect(transport.isOpen()).toBe(true);
    });
  });

  describe('findUSBTMCDevice', () => {
    it('should return null when no device matches', () => {
      fakes.findByIds.mockReturnValue(undefined);
      expect(findUSBTMCDevice(0x05E6, 0x2450)).toBeNull();
      expect(fakes.findByIds).toHaveBeenCalledWith(0x05E6, 0x2450);
    });
  });
});
