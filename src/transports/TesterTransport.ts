import { TesterMismatchError } from '../errors';
import log from '../logger';
import { BufferedTransport } from './BufferedTransport';

const logger = log.scope('tester');

/** `[expected write, canned response]`, strings are taken as latin1 bytes. */
export type CannedExchange = readonly [expected: string | Buffer, response: string | Buffer];

function toBytes(data: string | Buffer): Buffer {
    return typeof data === 'string' ? Buffer.from(data, 'latin1') : data;
}

/**
 * Offline stand-in for an instrument: every write must match the next
 * expected request byte for byte, and queues that request's canned response.
 */
export class TesterTransport extends BufferedTransport {
    readonly name: string;
    /** Every write, in order, including the one that failed to match. */
    readonly written: Buffer[] = [];

    private readonly exchanges: Array<{ expected: Buffer; response: Buffer }>;
    private cursor = 0;
    private opened = false;

    constructor(exchanges: readonly CannedExchange[], name = 'tester') {
        super();
        this.name = name;
        this.exchanges = exchanges.map(([expected, response]) => ({
            expected: toBytes(expected),
            response: toBytes(response)
        }));
    }

    get remaining(): number {
        return this.exchanges.length - this.cursor;
    }

    async open(): Promise<void> {
        this.opened = true;
    }

    async close(): Promise<void> {
        this.opened = false;
    }

    isOpen(): boolean {
        return this.opened;
    }

    async write(data: Buffer): Promise<void> {
        const actual = Buffer.from(data);
        this.written.push(actual);

        const next = this.exchanges[this.cursor];
        if (!next) {
            throw new TesterMismatchError(null, actual);
        }
        if (!next.expected.equals(actual)) {
            throw new TesterMismatchError(next.expected, actual);
        }
        this.cursor += 1;
        logger.debug(`${this.name}: matched exchange ${this.cursor}/${this.exchanges.length}`);
        if (next.response.length > 0) {
            this.receive(next.response);
        }
    }

    /** Throws when canned exchanges were left unused. */
    assertConsumed(): void {
        if (this.remaining > 0) {
            const pending = this.exchanges[this.cursor].expected.toString('latin1');
            throw new Error(`${this.remaining} canned exchange(s) not used, next expected ${JSON.stringify(pending)}`);
        }
    }
}
