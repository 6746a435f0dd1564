/**
 * USB-TMC (Test & Measurement Class) Transport
 * Carries text SCPI over USB bulk endpoints
 *
 * A reply may span several bulk-in transfers: each one is requested with a
 * REQUEST_DEV_DEP_MSG_IN and reading stops at the transfer carrying EOM.
 */

import usb from 'usb';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { createCommandLock } from './command-lock.js';

// USB-TMC Message IDs
export const DEV_DEP_MSG_OUT = 1;
export const REQUEST_DEV_DEP_MSG_IN = 2;

const HEADER_LENGTH = 12;
const BULK_TRANSFER = 2;
const EOM = 0x01;
const MAX_REPLY_TRANSFERS = 64;

// libusb codes after which the device is gone
const FATAL_USB_ERRORS = [
  'LIBUSB_ERROR_NO_DEVICE',
  'LIBUSB_ERROR_IO',
  'LIBUSB_ERROR_PIPE',
  'LIBUSB_TRANSFER_NO_DEVICE',
];

export interface USBTMCConfig {
  timeout?: number;       // Per-transfer timeout in ms (default: 2000)
  maxResponse?: number;   // Bytes requested per bulk-in transfer (default: 1024)
}

export interface DevDepMsgIn {
  text: string;
  /** Last transfer of the reply */
  endOfMessage: boolean;
}

interface Link {
  iface: usb.Interface;
  bulkIn: usb.InEndpoint;
  bulkOut: usb.OutEndpoint;
}

type LinkState =
  | { kind: 'closed' }
  | ({ kind: 'open' } & Link)
  | { kind: 'lost'; error: Error; iface: usb.Interface };

/** Bulk-out header; bTagInverse is the one's complement of bTag */
function bulkHeader(msgId: number, bTag: number, transferSize: number, attributes: number, length = HEADER_LENGTH): Buffer {
  const buf = Buffer.alloc(length);
  buf.writeUInt8(msgId, 0);
  buf.writeUInt8(bTag, 1);
  buf.writeUInt8(~bTag & 0xFF, 2);
  buf.writeUInt32LE(transferSize, 4);
  buf.writeUInt8(attributes, 8);
  return buf;
}

export function buildDevDepMsgOut(message: string, bTag: number): Buffer {
  const payload = Buffer.from(message, 'ascii');
  const padded = Math.ceil((HEADER_LENGTH + payload.length) / 4) * 4;
  const buf = bulkHeader(DEV_DEP_MSG_OUT, bTag, payload.length, EOM, padded);
  payload.copy(buf, HEADER_LENGTH);
  return buf;
}

export function buildRequestDevDepMsgIn(maxLength: number, bTag: number): Buffer {
  return bulkHeader(REQUEST_DEV_DEP_MSG_IN, bTag, maxLength, 0);
}

export function parseDevDepMsgIn(response: Buffer): Result<DevDepMsgIn, Error> {
  if (response.length < HEADER_LENGTH) {
    return Err(new Error(`USBTMC response too short: ${response.length} bytes (need at least ${HEADER_LENGTH})`));
  }
  const end = Math.min(response.length, HEADER_LENGTH + response.readUInt32LE(4));
  return Ok({
    text: response.toString('ascii', HEADER_LENGTH, end),
    endOfMessage: (response.readUInt8(8) & EOM) !== 0,
  });
}

// bTag runs 1..255, 0 is reserved
export function createTagGenerator(): () => number {
  let bTag = 0;
  return () => {
    bTag = (bTag % 255) + 1;
    return bTag;
  };
}

const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

export function createUSBTMCTransport(device: usb.Device, config: USBTMCConfig = {}): Transport {
  const { timeout = 2000, maxResponse = 1024 } = config;
  const nextTag = createTagGenerator();
  const exclusive = createCommandLock();
  let state: LinkState = { kind: 'closed' };

  function markLost(error: Error): void {
    if (state.kind === 'open') {
      state = { kind: 'lost', error, iface: state.iface };
    }
  }

  function currentLink(): Result<Link, Error> {
    if (state.kind === 'open') return Ok(state);
    return Err(state.kind === 'lost' ? state.error : new Error('Device not opened'));
  }

  // One endpoint transfer with a deadline; fatal errors drop the link
  function transfer<T>(start: (done: (err: Error | undefined, value: T) => void) => void): Promise<T> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(new Error(`Timeout waiting for USB response after ${timeout}ms`));
      }, timeout);

      start((err, value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          if (FATAL_USB_ERRORS.some(code => err.message.includes(code))) markLost(err);
          reject(err);
        } else {
          resolve(value);
        }
      });
    });
  }

  const send = (link: Link, data: Buffer) =>
    transfer<void>(done => link.bulkOut.transfer(data, err => done(err, undefined)));

  const receive = (link: Link, length: number) =>
    transfer<Buffer>(done => link.bulkIn.transfer(length, (err, data) => done(err, data ?? Buffer.alloc(0))));

  async function readReply(link: Link): Promise<Result<string, Error>> {
    let text = '';
    for (let n = 0; n < MAX_REPLY_TRANSFERS; n++) {
      await send(link, buildRequestDevDepMsgIn(maxResponse, nextTag()));
      const chunk = parseDevDepMsgIn(await receive(link, maxResponse + HEADER_LENGTH));
      if (!chunk.ok) return chunk;
      text += chunk.value.text;
      if (chunk.value.endOfMessage) return Ok(text.trim());
    }
    return Err(new Error(`USBTMC reply not terminated after ${MAX_REPLY_TRANSFERS} transfers`));
  }

  function claimInterface(): Result<Link, Error> {
    try {
      const iface = device.interfaces?.[0];
      if (!iface) return Err(new Error('No interfaces found on device'));
      if (iface.isKernelDriverActive()) iface.detachKernelDriver();
      iface.claim();

      let bulkIn: usb.InEndpoint | null = null;
      let bulkOut: usb.OutEndpoint | null = null;
      for (const endpoint of iface.endpoints) {
        if (endpoint.transferType !== BULK_TRANSFER) continue;
        if (endpoint instanceof usb.InEndpoint) bulkIn = endpoint;
        else if (endpoint instanceof usb.OutEndpoint) bulkOut = endpoint;
      }
      if (!bulkIn || !bulkOut) return Err(new Error('Could not find bulk endpoints'));
      return Ok({ iface, bulkIn, bulkOut });
    } catch (e) {
      return Err(toError(e));
    }
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (state.kind === 'open') return Ok(undefined);

      try {
        device.open();
      } catch (e) {
        return Err(toError(e));
      }

      const link = claimInterface();
      if (!link.ok) {
        // The claim error is the one reported
        try {
          device.close();
        } catch (closeErr) {
          console.warn('[USBTMC] close after failed open:', toError(closeErr).message);
        }
        return link;
      }

      state = { kind: 'open', ...link.value };
      return Ok(undefined);
    },

    async close(): Promise<Result<void, Error>> {
      if (state.kind === 'closed') return Ok(undefined);

      // Waits for an in-flight exchange
      return exclusive(async () => {
        if (state.kind === 'closed') return Ok(undefined);
        const { iface } = state;
        state = { kind: 'closed' };
        try {
          iface.release(true);
          device.close();
          return Ok(undefined);
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return exclusive(async () => {
        const link = currentLink();
        if (!link.ok) return link;
        try {
          await send(link.value, buildDevDepMsgOut(`${cmd}\n`, nextTag()));
          return await readReply(link.value);
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return exclusive(async () => {
        const link = currentLink();
        if (!link.ok) return link;
        try {
          await send(link.value, buildDevDepMsgOut(`${cmd}\n`, nextTag()));
          return Ok(undefined);
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    isOpen(): boolean {
      return state.kind === 'open';
    },
  };
}

/** Open handle for a known instrument (no bus enumeration) */
export function findUSBTMCDevice(vendorId: number, productId: number): usb.Device | null {
  return usb.findByIds(vendorId, productId) ?? null;
}
