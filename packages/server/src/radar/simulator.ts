import type { SignalKind } from '@radarscope/shared';
import { DEMO_NAMES, SIMULATED_KINDS } from '../signal/catalog.js';
import { TWO_PI } from '../signal/geometry.js';
import { Signal, type SignalLimits } from '../signal/model.js';
import { pick, randomInt, type Random } from '../util/runtime.js';

export interface SimulatorDeps {
  limits: SignalLimits;
  random: Random;
  nextId: () => string;
}

function simulated(kind: SignalKind, name: string, now: number, deps: SimulatorDeps, phase = 0): Signal {
  const { random, limits, nextId } = deps;
  const distance = random() * 4 + 2;
  const angle = random() * TWO_PI;
  const strength = randomInt(random, 50, 100);
  const signal = new Signal({
    id: nextId(), kind, name, origin: 'simulated', strength, distance, angle, phase, createdAt: now,
  }, limits);
  signal.recordPosition(now, true);
  return signal;
}

/** Opening population: the first four kinds always, the rest at 70 %. */
export function generateInitialSignals(now: number, deps: SimulatorDeps): Signal[] {
  const signals: Signal[] = [];
  SIMULATED_KINDS.forEach((kind, i) => {
    if (i < 4 || deps.random() < 0.7) {
      const name = pick(deps.random, DEMO_NAMES[kind]);
      signals.push(simulated(kind, name, now, deps, randomInt(deps.random, 0, 3)));
    }
  });
  return signals;
}

/** One new contact of a random kind, named `SIM-<kind>`. */
export function synthesizeSignal(now: number, deps: SimulatorDeps): Signal {
  const kind = pick(deps.random, SIMULATED_KINDS);
  return simulated(kind, `SIM-${kind}`, now, deps);
}
