// benchlink public API

export * from './devices/types.js';
export * from './devices/errors.js';
export * from './devices/units.js';
export * from './devices/format.js';
export { ScpiParser } from './devices/scpi-parser.js';
export { createCommandLock } from './devices/command-lock.js';
export type { WithLock } from './devices/command-lock.js';

export { createCommunicator, openTransport, applyNewlinePolicy } from './devices/communicator.js';
export { createInstrument } from './devices/instrument.js';
export type { Instrument, InstrumentOptions } from './devices/instrument.js';
export * from './devices/property-factory.js';
export * from './devices/proxy-list.js';

export { createSerialTransport, listSerialPorts, findSerialPort } from './devices/transports/serial.js';
export type { SerialConfig } from './devices/transports/serial.js';
export { createSocketTransport } from './devices/transports/socket.js';
export type { SocketConfig } from './devices/transports/socket.js';
export { createFileTransport } from './devices/transports/file.js';
export type { FileConfig } from './devices/transports/file.js';
export { createLoopbackTransport } from './devices/transports/loopback.js';
export type {
  LoopbackConfig,
  LoopbackTransport,
  ProtocolDirection,
  ProtocolEntry,
  ProtocolTranscript,
} from './devices/transports/loopback.js';
export { createUSBTMCTransport } from './devices/transports/usbtmc.js';
export type { USBTMCConfig } from './devices/transports/usbtmc.js';
export { createRawUsbTransport } from './devices/transports/usb.js';
export type { RawUsbConfig } from './devices/transports/usb.js';
export { findUsbDevices, findUsbDevice } from './devices/transports/usb-endpoints.js';
export { createVisaTransport, parseVisaResource } from './devices/transports/visa.js';
export type { VisaConfig, VisaResource } from './devices/transports/visa.js';
export { createGpibCommunicator, validateGpibAddress } from './devices/transports/gpib-usb.js';
export type { GpibBusSettings, GpibEos, GpibOptions, GpibTerminator } from './devices/transports/gpib-usb.js';
export { createSerialManager } from './devices/transports/serial-manager.js';
export type { SerialManager, SerialManagerOptions } from './devices/transports/serial-manager.js';

export { openCommunicator, parseUri } from './devices/uri.js';
export type { OpenOptions, ParsedUri } from './devices/uri.js';
export { createInstrumentRegistry } from './devices/registry.js';
export type {
  Device,
  InstrumentFactory,
  InstrumentRegistration,
  InstrumentRegistry,
  InstrumentRegistryOptions,
} from './devices/registry.js';

export { expectedProtocol, recordingCommunicator } from './devices/testing/expected-protocol.js';
export type {
  ExpectedProtocolOptions,
  ProtocolLine,
  RecordingCommunicator,
} from './devices/testing/expected-protocol.js';

export * from './devices/drivers/index.js';

export { defaults, loadInstruments, parseInstrumentConfig, walkConfig } from './config.js';
export type { Defaults, InstrumentEntry } from './config.js';
