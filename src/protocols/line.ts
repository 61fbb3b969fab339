import { Protocol } from './protocol';

/**
 * Request/response over plain lines: one templated request, one line back.
 * Writes are fire-and-forget.
 */
export class LineProtocol extends Protocol {
    readonly id = 'line';
}
