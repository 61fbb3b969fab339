import log from '../logger';
import { PidController, type PidSettings } from '../pid';
import { BufferedTransport } from './BufferedTransport';

const logger = log.scope('virtual');

// Status codes share their meaning with the Watlow 988 error table
export const VIRTUAL_STATUS = {
    ok: '0',
    inputOutOfLimit: '25',
    readOnly: '26',
    writeOnly: '27',
    unknownCommand: '20'
} as const;

interface Register {
    read?: () => number;
    write?: (value: number) => void;
}

export interface VirtualTransportOptions {
    pid?: Partial<PidSettings>;
    /** Gain and time constant of the first-order process the PID drives. */
    processGain?: number;
    timeConstant?: number;
    terminator?: string;
}

/**
 * A simulated PID loop behind a serial-like line protocol. Every request
 * gets a status line (`0` on success); queries (`SP?`) add a value line,
 * writes look like `SP 10`.
 *
 * Nothing moves on its own: the process only evolves in {@link advance}.
 */
export class VirtualTransport extends BufferedTransport {
    readonly name: string;
    readonly pid: PidController;

    private readonly processGain: number;
    private readonly timeConstant: number;
    private readonly terminator: string;
    private readonly registers: Record<string, Register>;
    private pendingRequest = '';
    private opened = false;
    private clock = 0;
    private measure = 0;
    private output = 0;

    constructor(options: VirtualTransportOptions = {}, name = 'virtual') {
        super();
        this.name = name;
        this.pid = new PidController(options.pid);
        this.processGain = options.processGain ?? 5.0;
        this.timeConstant = options.timeConstant ?? 10.0;
        this.terminator = options.terminator ?? '\n';
        this.registers = {
            SP: { read: () => this.pid.setpoint, write: (v) => { this.pid.setpoint = v; } },
            PV: { read: () => this.measure },
            OUT: { read: () => this.output },
            KP: { read: () => this.pid.proportional, write: (v) => { this.pid.proportional = v; } },
            TI: { read: () => this.pid.integralTime, write: (v) => { this.pid.integralTime = v; } },
            TD: { read: () => this.pid.derivativeTime, write: (v) => { this.pid.derivativeTime = v; } },
            VMIN: { read: () => this.pid.vmin, write: (v) => { this.pid.vmin = v; } },
            VMAX: { read: () => this.pid.vmax, write: (v) => { this.pid.vmax = v; } },
            RST: { write: () => this.pid.reset(this.clock) }
        };
    }

    get time(): number {
        return this.clock;
    }

    async open(): Promise<void> {
        this.opened = true;
        logger.info(`${this.name}: opened`);
    }

    async close(): Promise<void> {
        this.opened = false;
        logger.info(`${this.name}: closed`);
    }

    isOpen(): boolean {
        return this.opened;
    }

    async write(data: Buffer): Promise<void> {
        this.pendingRequest += data.toString('latin1');
        let index = this.pendingRequest.indexOf(this.terminator);
        while (index >= 0) {
            const request = this.pendingRequest.slice(0, index).trim();
            this.pendingRequest = this.pendingRequest.slice(index + this.terminator.length);
            this.respond(this.handle(request));
            index = this.pendingRequest.indexOf(this.terminator);
        }
    }

    /** Moves simulated time forward, integrating the process in `step` sized increments. */
    advance(seconds: number, step = 0.1): void {
        let left = seconds;
        while (left > 1e-9) {
            const dt = Math.min(step, left);
            this.clock += dt;
            this.output = this.pid.computeOutput(this.measure, this.clock);
            this.measure += dt * (this.processGain * this.output - this.measure) / this.timeConstant;
            left -= dt;
        }
    }

    private handle(request: string): string[] {
        const query = /^([A-Z]+)\?$/.exec(request);
        if (query) {
            const register = this.registers[query[1]];
            if (!register) return [VIRTUAL_STATUS.unknownCommand];
            if (!register.read) return [VIRTUAL_STATUS.writeOnly];
            return [VIRTUAL_STATUS.ok, String(register.read())];
        }

        const command = /^([A-Z]+)(?:\s+(\S+))?$/.exec(request);
        if (!command) return [VIRTUAL_STATUS.unknownCommand];
        const [, mnemonic, argument] = command;
        const register = this.registers[mnemonic];
        if (!register) return [VIRTUAL_STATUS.unknownCommand];
        if (!register.write) return [VIRTUAL_STATUS.readOnly];

        const value = argument === undefined ? 0 : Number(argument);
        if (Number.isNaN(value)) return [VIRTUAL_STATUS.inputOutOfLimit];
        register.write(value);
        return [VIRTUAL_STATUS.ok];
    }

    private respond(lines: string[]): void {
        this.receive(Buffer.from(lines.map(line => line + this.terminator).join(''), 'latin1'));
    }
}
