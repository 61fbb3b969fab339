import { DecodeError, DeviceError } from '../errors';
import type { Transport } from '../transports/types';
import { Protocol } from './protocol';

export const ACK = 0x06;
export const NAK = 0x15;
export const ENQ = 0x05;

/**
 * Close to ANSI X3.28: every request is acknowledged (ACK or NAK), and the
 * host must enquire (ENQ) before a value is sent back.
 *
 *     -> PR1\r\n
 *     <- ACK\r\n
 *     -> ENQ
 *     <- 0,1.0000E-03\r\n
 */
export class EnqProtocol extends Protocol {
    readonly id = 'enq';

    protected override async decodeRead(transport: Transport, request: Buffer): Promise<string> {
        await this.readAcknowledge(transport, request);
        await transport.write(Buffer.concat([Buffer.from([ENQ]), this.terminator]));
        const payload = await this.readLine(transport);
        this.expectEndOfResponse(transport, payload);
        return payload;
    }

    protected override async acknowledgeWrite(transport: Transport, request: Buffer): Promise<void> {
        const ack = await this.readAcknowledge(transport, request);
        this.expectEndOfResponse(transport, ack);
    }

    private async readAcknowledge(transport: Transport, request: Buffer): Promise<string> {
        const line = await this.readLine(transport);
        const first = line.charCodeAt(0);
        if (first === NAK) {
            throw new DeviceError('NAK', `${request.toString('latin1').trim()} not acknowledged`);
        }
        if (first !== ACK) {
            throw new DecodeError(line, 'expected ACK or NAK');
        }
        return line;
    }
}
