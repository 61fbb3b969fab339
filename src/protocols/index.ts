import { EchoStatusProtocol } from './echo';
import { EnqProtocol } from './enq';
import { LineProtocol } from './line';
import { Protocol, type ProtocolOptions } from './protocol';
import { StatusCodeProtocol, type StatusCodeProtocolOptions } from './status';
import { XonXoffProtocol, type XonXoffProtocolOptions } from './xon';

export type AnyProtocolOptions = ProtocolOptions & StatusCodeProtocolOptions & XonXoffProtocolOptions;

export interface ProtocolEntry {
    id: string;
    name: string;
    description: string;
    create(options: AnyProtocolOptions): Protocol;
}

export const PROTOCOLS: Record<string, ProtocolEntry> = {
    line: {
        id: 'line',
        name: 'Plain lines',
        description: 'One request line, one answer line',
        create: (options) => new LineProtocol(options)
    },
    status: {
        id: 'status',
        name: 'Status code',
        description: 'Numeric status line before the payload (e.g. Fluke 18x)',
        create: (options) => new StatusCodeProtocol(options)
    },
    xon: {
        id: 'xon',
        name: 'XON/XOFF',
        description: 'Busy/ready handshake (e.g. Watlow 988)',
        create: (options) => new XonXoffProtocol(options)
    },
    enq: {
        id: 'enq',
        name: 'ACK/ENQ',
        description: 'Acknowledge then enquire (e.g. Pfeiffer MaxiGauge)',
        create: (options) => new EnqProtocol(options)
    },
    echo: {
        id: 'echo',
        name: 'Echo + status',
        description: 'Echoed request, answer, :OK/:ERR (e.g. Amtron CS400)',
        create: (options) => new EchoStatusProtocol(options)
    }
};

export const createProtocol = (id: string, options: AnyProtocolOptions): Protocol => {
    const entry = PROTOCOLS[id];
    if (!entry) {
        throw new Error(`Unknown protocol "${id}", expected one of ${Object.keys(PROTOCOLS).join(', ')}`);
    }
    return entry.create(options);
};

export { EchoStatusProtocol, EnqProtocol, LineProtocol, Protocol, StatusCodeProtocol, XonXoffProtocol };
export type { ProtocolOptions, StatusCodeProtocolOptions, XonXoffProtocolOptions };
export { FramingTemplate } from './template';
export { CallProtocol, propertyAccessors } from './call';
export type { Accessor, Accessors, CallProtocolOptions } from './call';
