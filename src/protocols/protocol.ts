import { DecodeError, DefinitionError } from '../errors';
import type { Transport } from '../transports/types';
import type { Attributes, FramingContext } from '../types';
import { FramingTemplate } from './template';

export interface ProtocolOptions {
    /** Read frame, e.g. `{param[mnemonic]}?\r`. */
    read?: string;
    /** Write frame, e.g. `{param[mnemonic]} {val}\r`. */
    write?: string;
    terminator?: string;
    timeoutMs?: number;
    /** Protocol-scoped addressing such as a daisy-chain node, visible as `{protocol[<name>]}`. */
    attributes?: Attributes;
}

export type Direction = 'read' | 'write';

/**
 * Framing engine: renders a command evaluation into bytes, performs the
 * exchange on a transport, and strips the envelope from the answer.
 *
 * Subclasses override {@link decodeRead} and {@link acknowledgeWrite} for
 * handshakes; the templates cover everything else. Protocols keep no state
 * between calls.
 */
export abstract class Protocol {
    abstract readonly id: string;

    readonly readTemplate: FramingTemplate | null;
    readonly writeTemplate: FramingTemplate | null;
    readonly terminator: Buffer;
    readonly timeoutMs: number;
    readonly attributes: Readonly<Attributes>;

    constructor(options: ProtocolOptions) {
        this.readTemplate = options.read !== undefined ? new FramingTemplate(options.read, { allowValue: false }) : null;
        this.writeTemplate = options.write !== undefined ? new FramingTemplate(options.write, { allowValue: true }) : null;
        this.terminator = Buffer.from(options.terminator ?? '\n', 'latin1');
        this.timeoutMs = options.timeoutMs ?? 1000;
        this.attributes = Object.freeze({ ...options.attributes });
    }

    encodeRead(context: FramingContext): Buffer {
        if (!this.readTemplate) throw new DefinitionError(`Protocol ${this.id} has no read template`);
        return Buffer.from(this.readTemplate.render(context), 'latin1');
    }

    encodeWrite(context: FramingContext, wire: string): Buffer {
        if (!this.writeTemplate) throw new DefinitionError(`Protocol ${this.id} has no write template`);
        return Buffer.from(this.writeTemplate.render(context, wire), 'latin1');
    }

    /** Renders without any I/O so missing attributes surface when the driver is built. */
    validate(context: FramingContext, direction: Direction): void {
        if (direction === 'read') this.encodeRead(context);
        else this.encodeWrite(context, '');
    }

    async query(transport: Transport, context: FramingContext): Promise<string> {
        const request = this.encodeRead(context);
        await transport.write(request);
        return this.decodeRead(transport, request);
    }

    async send(transport: Transport, context: FramingContext, wire: string): Promise<void> {
        const request = this.encodeWrite(context, wire);
        await transport.write(request);
        await this.acknowledgeWrite(transport, request);
    }

    /** Default: the first line of the answer, trimmed. */
    protected async decodeRead(transport: Transport, _request: Buffer): Promise<string> {
        const payload = await this.readLine(transport);
        this.expectEndOfResponse(transport, payload);
        return payload;
    }

    /** Default: writes are not acknowledged. */
    protected async acknowledgeWrite(_transport: Transport, _request: Buffer): Promise<void> {
        return;
    }

    protected async readLine(transport: Transport, timeoutMs = this.timeoutMs): Promise<string> {
        const line = await transport.read(this.terminator, timeoutMs);
        return line.toString('latin1').trim();
    }

    /** A response longer than the protocol expects is malformed, not silently truncated. */
    protected expectEndOfResponse(transport: Transport, payload: string): void {
        const extra = transport.available();
        if (extra > 0) {
            const trailing = transport.discardInput().toString('latin1');
            throw new DecodeError(payload, `unexpected trailing data ${JSON.stringify(trailing)}`);
        }
    }
}
