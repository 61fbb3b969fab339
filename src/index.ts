export * from './errors';
export type { Access, AttributeValue, Attributes, FramingContext } from './types';
export * from './codecs';
export { Action, Command, parameter } from './command';
export type { AnyCommand, CommandKind, CommandLink, CommandOptions } from './command';
export { Subsystem, defineSubsystem, fromDeclaration } from './subsystem';
export type {
    CommandDeclaration,
    SubsystemAddressing,
    SubsystemDeclaration,
    SubsystemMember,
    SubsystemMembers
} from './subsystem';
export * from './protocols';
export type { Direction } from './protocols/protocol';
export type { Parity, Transport } from './transports/types';
export { BufferedTransport } from './transports/BufferedTransport';
export { SerialTransport } from './transports/SerialTransport';
export type { Port, PortFactory, PortOpenOptions, SerialTransportOptions } from './transports/SerialTransport';
export { InProcessTransport } from './transports/InProcessTransport';
export { TesterTransport } from './transports/TesterTransport';
export type { CannedExchange } from './transports/TesterTransport';
export { VIRTUAL_STATUS, VirtualTransport } from './transports/VirtualTransport';
export type { VirtualTransportOptions } from './transports/VirtualTransport';
export { PidController } from './pid';
export type { PidSettings } from './pid';
export { Instrument, createInstrument } from './instrument';
export type { CreateInstrumentOptions, InstrumentOptions, Operation } from './instrument';
export { OperationQueue, PendingOperation } from './queue';
export type { OperationState, Outcome } from './queue';
export { InstrumentAdapter } from './adapter';
export type { AdapterOptions, CommandInfo, SettledEvent, SubmitOptions } from './adapter';
export {
    DEFAULT_TRANSPORT_CONFIG,
    createTransport,
    getConfigDir,
    getConfigPath,
    instrumentFromConfig,
    loadTransportConfig,
    saveTransportConfig
} from './config';
export type { DriverFactory, TransportConfig } from './config';
export { default as log } from './logger';
export { createVirtualInstrument, createVirtualProtocol, virtualMapping } from './drivers/virtual';
export { createFluke18x, createFlukeProtocol } from './drivers/fluke';
export { WATLOW_ERRORS, createWatlow988, createWatlowProtocol } from './drivers/watlow';
export { createMaxiGauge, createMaxiGaugeProtocol, pressure } from './drivers/pfeiffer';
export { createAmtronCS400, createAmtronProtocol } from './drivers/amtron';
