export interface PidSettings {
    proportional: number;
    /** Integral time in seconds, 0 disables the integral term. */
    integralTime: number;
    /** Derivative time in seconds. */
    derivativeTime: number;
    vmin: number;
    vmax: number;
}

const DEFAULT_SETTINGS: PidSettings = {
    proportional: 2.0,
    integralTime: 0.0,
    derivativeTime: 0.0,
    vmin: 0.0,
    vmax: 100.0
};

/**
 * Software PID controller in standard form:
 *
 *     u(t) = Kp * (e(t) + 1/Ti * ∫e dt + Td * de/dt)
 *
 * Time is always passed in by the caller, so a run is reproducible.
 */
export class PidController {
    proportional: number;
    vmin: number;
    vmax: number;
    setpoint = 0.0;
    /** Soft integrator while the output saturates, 1.0 disables it. */
    antiWindup = 0.25;
    proportionalOnPv = false;

    private integralGain = 0.0;
    private derivativeGain = 0.0;
    private previousInput = 0.0;
    private accumulated = 0.0;
    private previousTime: number;

    constructor(settings: Partial<PidSettings> = {}, now = 0) {
        const merged = { ...DEFAULT_SETTINGS, ...settings };
        this.proportional = merged.proportional;
        this.vmin = merged.vmin;
        this.vmax = merged.vmax;
        this.integralTime = merged.integralTime;
        this.derivativeTime = merged.derivativeTime;
        this.previousTime = now;
    }

    get integralTime(): number {
        return this.integralGain === 0.0 ? 0.0 : this.proportional / this.integralGain;
    }

    set integralTime(seconds: number) {
        this.integralGain = seconds === 0.0 ? 0.0 : this.proportional / seconds;
    }

    get derivativeTime(): number {
        return this.proportional === 0.0 ? 0.0 : this.derivativeGain / this.proportional;
    }

    set derivativeTime(seconds: number) {
        this.derivativeGain = this.proportional * seconds;
    }

    reset(now: number): void {
        this.previousTime = now;
        this.accumulated = 0.0;
    }

    computeOutput(measure: number, now: number): number {
        const error = this.setpoint - measure;
        const dt = now - this.previousTime;

        const p = this.proportional * (this.proportionalOnPv ? measure : error);
        let i = 0.0;
        let d = 0.0;
        if (dt > 0.0) {
            i = this.integralGain * this.accumulated * dt;
            d = this.derivativeGain * (measure - this.previousInput) / dt;
        }
        this.previousTime = now;
        this.previousInput = measure;

        let output = p + i + d;
        if (output > this.vmax) {
            output = this.vmax;
            this.accumulated += this.antiWindup * error;
        } else if (output < this.vmin) {
            output = this.vmin;
            this.accumulated += this.antiWindup * error;
        } else {
            this.accumulated += error;
        }
        return output;
    }
}
