import type { DetectedSignal } from '@radarscope/shared';
import type { Scanner } from '../scanner/types.js';
import { DEMO_NAMES, SIMULATED_KINDS } from '../signal/catalog.js';
import { pick, randomInt, systemRandom, type Random } from '../util/runtime.js';

/** Synthetic detections behind the real scanner contract, for demo mode. */
export class DemoScanner implements Scanner {
  constructor(private readonly count = 3, private readonly random: Random = systemRandom, private readonly delayMs = 150) {}

  name(): string { return 'Demo Scanner'; }
  isAvailable(): boolean { return true; }

  scan(signal: AbortSignal): Promise<DetectedSignal[]> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(Array.from({ length: this.count }, () => this.detection()));
      }, this.delayMs);
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private detection(): DetectedSignal {
    const kind = pick(this.random, SIMULATED_KINDS);
    return {
      kind,
      name: pick(this.random, DEMO_NAMES[kind]),
      strength: randomInt(this.random, 40, 100),
      distance: this.random() * 6 + 1,
      source: this.name(),
    };
  }
}
