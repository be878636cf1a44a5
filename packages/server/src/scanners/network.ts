// ============================================================================
// RadarScope — Network Activity Scanner
// Established connections from netstat, plus the host's active interfaces.
// ============================================================================
import os from 'os';
import type { DetectedSignal, ScanConfig } from '@radarscope/shared';
import type { Scanner } from '../scanner/types.js';
import { commandExists, runCommand, type CommandProbe, type CommandRunner } from './exec.js';
import { systemRandom, type Random } from '../util/runtime.js';
import { describeError } from '../util/errors.js';
import { createLogger } from '../util/log.js';

const log = createLogger('🔌 [Network]');

const COMMAND_TIMEOUT_MS = 2_000;

export type ConnectionBucket = 'HTTP' | 'SSH' | 'DNS' | 'Other';

const BUCKET_ICONS: Record<ConnectionBucket, string> = { HTTP: '⚡', SSH: '🔐', DNS: '🌐', Other: '▲' };
const BUCKET_ORDER: ConnectionBucket[] = ['HTTP', 'SSH', 'DNS', 'Other'];

function portOf(address: string): number | undefined {
  const match = /[:.](\d+)$/.exec(address);
  return match ? parseInt(match[1], 10) : undefined;
}

function bucketFor(ports: (number | undefined)[]): ConnectionBucket {
  if (ports.some((p) => p === 80 || p === 443)) return 'HTTP';
  if (ports.includes(22)) return 'SSH';
  if (ports.includes(53)) return 'DNS';
  return 'Other';
}

/** Counts ESTABLISHED rows of `netstat -n` by service. Works with Linux (`:port`) and BSD (`.port`) addresses. */
export function countConnections(output: string): Record<ConnectionBucket, number> {
  const counts: Record<ConnectionBucket, number> = { HTTP: 0, SSH: 0, DNS: 0, Other: 0 };
  for (const line of output.split('\n')) {
    const fields = line.trim().split(/\s+/);
    const state = fields.indexOf('ESTABLISHED');
    if (state < 2) continue;
    const local = fields[state - 2];
    const foreign = fields[state - 1];
    counts[bucketFor([portOf(local), portOf(foreign)])]++;
  }
  return counts;
}

type InterfaceTable = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

export interface NetworkScannerOptions {
  run?: CommandRunner;
  probe?: CommandProbe;
  interfaces?: () => InterfaceTable;
  random?: Random;
}

export class NetworkActivityScanner implements Scanner {
  private readonly run: CommandRunner;
  private readonly probe: CommandProbe;
  private readonly interfaces: () => InterfaceTable;
  private readonly random: Random;

  constructor(private readonly config: ScanConfig, options: NetworkScannerOptions = {}) {
    this.run = options.run ?? runCommand;
    this.probe = options.probe ?? commandExists;
    this.interfaces = options.interfaces ?? (() => os.networkInterfaces());
    this.random = options.random ?? systemRandom;
  }

  name(): string { return 'Network Interface Scanner'; }

  isAvailable(): boolean {
    return this.probe('netstat');
  }

  async scan(signal: AbortSignal): Promise<DetectedSignal[]> {
    const counts = await this.readConnections(signal);
    const signals: DetectedSignal[] = [];

    for (const bucket of BUCKET_ORDER) {
      const count = counts[bucket];
      if (count === 0) continue;
      signals.push({
        kind: 'Network',
        icon: BUCKET_ICONS[bucket],
        name: `${bucket} (${count})`,
        strength: Math.min(100, count * 20),
        distance: this.random() * 3 + 1,
        source: this.name(),
      });
    }

    signals.push(...this.interfaceSignals());
    return signals.slice(0, this.config.maxSignals);
  }

  /** A failed netstat still leaves the interface report. */
  private async readConnections(signal: AbortSignal): Promise<Record<ConnectionBucket, number>> {
    try {
      return countConnections(await this.run('netstat', ['-n'], signal, COMMAND_TIMEOUT_MS));
    } catch (err) {
      if (signal.aborted) throw err;
      log.warn(`netstat failed: ${describeError(err)}`);
      return { HTTP: 0, SSH: 0, DNS: 0, Other: 0 };
    }
  }

  private interfaceSignals(): DetectedSignal[] {
    const signals: DetectedSignal[] = [];
    for (const [name, infos] of Object.entries(this.interfaces())) {
      if (!infos || !infos.some((info) => info.family === 'IPv4' && !info.internal)) continue;
      const wireless = name.startsWith('wl') || name.startsWith('wifi');
      const wired = name.startsWith('en') || name.startsWith('eth');
      signals.push({
        kind: wireless ? 'WiFi' : 'Network',
        icon: wireless ? '≋' : wired ? '⇌' : '▲',
        name: `${name} Interface`,
        strength: wired ? 80 : wireless ? 70 : 40,
        distance: this.random() * 2 + 0.5,
        source: this.name(),
      });
    }
    return signals;
  }
}
