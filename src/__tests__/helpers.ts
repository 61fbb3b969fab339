import { InstrumentAdapter } from '../adapter';
import { createVirtualInstrument, virtualMapping } from '../drivers/virtual';

/** Adapter over a fresh simulated PID loop, with the GUI names mapped. */
export function adapterFor(): InstrumentAdapter {
    return new InstrumentAdapter(createVirtualInstrument(), { mapping: virtualMapping });
}
