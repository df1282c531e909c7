/**
 * USB bulk endpoint plumbing shared by the USBTMC and raw USB transports
 */

import usb from 'usb';
import type { Device, Interface, InEndpoint, OutEndpoint } from 'usb';
import type { Result, TransportKind } from '../types.js';
import { Ok, Err } from '../types.js';
import { ConnectionError, TimeoutError, TransportError, toError } from '../errors.js';
import type { InstrumentError } from '../errors.js';

// Fatal USB errors that indicate device disconnection
const FATAL_USB_ERRORS = [
  'LIBUSB_ERROR_NO_DEVICE',
  'LIBUSB_ERROR_IO',
  'LIBUSB_ERROR_PIPE',
  'LIBUSB_TRANSFER_NO_DEVICE',
];

const BULK_TRANSFER = 2;

export interface BulkEndpoints {
  iface: Interface;
  bulkIn: InEndpoint;
  bulkOut: OutEndpoint;
}

export interface UsbDeviceInfo {
  vendorId: number;
  productId: number;
  device: Device;
}

// Check if an error indicates device disconnection
export function isFatalError(err: Error): boolean {
  return FATAL_USB_ERRORS.some(code => err.message.includes(code));
}

export function formatUsbAddress(device: Device): string {
  const { idVendor, idProduct } = device.deviceDescriptor;
  const hex = (n: number) => `0x${n.toString(16).padStart(4, '0')}`;
  return `${hex(idVendor)}:${hex(idProduct)}`;
}

/**
 * Open the device, claim interface 0 and locate its bulk endpoints.
 * On failure the device is closed again.
 */
export function claimBulkEndpoints(
  device: Device,
  kind: TransportKind,
  address: string
): Result<BulkEndpoints, ConnectionError> {
  const context = { transport: kind, address };

  try {
    device.open();
  } catch (e) {
    const cause = toError(e);
    return Err(new ConnectionError(`Failed to open USB device: ${cause.message}`, { ...context, cause }));
  }

  try {
    if (!device.interfaces || device.interfaces.length === 0) {
      device.close();
      return Err(new ConnectionError('No interfaces found on device', context));
    }

    const iface = device.interfaces[0];

    if (iface.isKernelDriverActive()) {
      iface.detachKernelDriver();
    }
    iface.claim();

    let bulkIn: InEndpoint | null = null;
    let bulkOut: OutEndpoint | null = null;
    for (const endpoint of iface.endpoints) {
      if (endpoint.transferType === BULK_TRANSFER) {
        if (endpoint.direction === 'in') {
          bulkIn = endpoint as InEndpoint;
        } else if (endpoint.direction === 'out') {
          bulkOut = endpoint as OutEndpoint;
        }
      }
    }

    if (!bulkIn || !bulkOut) {
      device.close();
      return Err(new ConnectionError('Could not find bulk endpoints', context));
    }

    return Ok({ iface, bulkIn, bulkOut });
  } catch (e) {
    const cause = toError(e);
    // Clean up on partial open failure; the claim error is what gets reported
    try {
      device.close();
    } catch (closeError) {
      console.warn(`[USB] Failed to close ${address} after open error: ${toError(closeError).message}`);
    }
    return Err(new ConnectionError(`Failed to claim USB interface: ${cause.message}`, { ...context, cause }));
  }
}

export function releaseBulkEndpoints(
  device: Device,
  endpoints: BulkEndpoints | null,
  kind: TransportKind,
  address: string
): Result<void, ConnectionError> {
  try {
    endpoints?.iface.release(true);
    device.close();
  } catch (e) {
    const cause = toError(e);
    return Err(new ConnectionError(`Failed to close USB device: ${cause.message}`, {
      transport: kind,
      address,
      cause,
    }));
  }
  return Ok();
}

export function transferOut(endpoint: OutEndpoint, data: Buffer): Promise<Result<void, Error>> {
  return new Promise(resolve => {
    endpoint.transfer(data, (err) => {
      resolve(err ? Err(err) : Ok());
    });
  });
}

/** A timed-out transfer is left pending on the endpoint; `clearHalts` must run before reuse. */
export function transferIn(
  endpoint: InEndpoint,
  length: number,
  timeoutMs: number
): Promise<Result<Buffer, Error | 'timeout'>> {
  return new Promise(resolve => {
    let settled = false;

    const timeoutId = setTimeout(() => {
      if (!settled) {
        settled = true;
        resolve(Err('timeout'));
      }
    }, timeoutMs);

    endpoint.transfer(length, (err, data) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      resolve(err ? Err(err) : Ok(data ?? Buffer.alloc(0)));
    });
  });
}

/** Time left until `deadline` (a `Date.now()` value), never negative. */
export function remainingMs(deadline: number): number {
  return Math.max(0, deadline - Date.now());
}

export async function clearHalts(endpoints: BulkEndpoints): Promise<Result<void, Error>> {
  for (const endpoint of [endpoints.bulkIn, endpoints.bulkOut]) {
    const cleared = await new Promise<Result<void, Error>>(resolve => {
      endpoint.clearHalt((err) => resolve(err ? Err(err) : Ok()));
    });
    if (!cleared.ok) return cleared;
  }
  return Ok();
}

/** Map a low-level transfer failure to the error surfaced to callers. */
export function transferError(
  failure: Error | 'timeout',
  kind: TransportKind,
  address: string,
  timeoutMs: number
): InstrumentError {
  const context = { transport: kind, address };
  if (failure === 'timeout') {
    return new TimeoutError(`Timeout waiting for USB response after ${timeoutMs}ms`, timeoutMs, false, context);
  }
  return new TransportError(`USB transfer failed: ${failure.message}`, { ...context, cause: failure });
}

// Helper to list attached USB devices
export function findUsbDevices(): UsbDeviceInfo[] {
  return usb.getDeviceList().map(device => ({
    vendorId: device.deviceDescriptor.idVendor,
    productId: device.deviceDescriptor.idProduct,
    device,
  }));
}

export function findUsbDevice(vendorId: number, productId: number): Device | null {
  return usb.findByIds(vendorId, productId) ?? null;
}
