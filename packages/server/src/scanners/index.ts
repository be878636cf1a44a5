import type { RadarConfig, ScanConfig } from '@radarscope/shared';
import type { Scanner } from '../scanner/types.js';
import { DemoScanner } from './demo.js';
import { NetworkActivityScanner } from './network.js';
import { WiFiScanner } from './wifi.js';

export { DemoScanner, NetworkActivityScanner, WiFiScanner };

/** Scanners to offer the coordinator, in registration order. Availability is probed there. */
export function createScanners(config: Pick<RadarConfig, 'demoScanner'>, scan: ScanConfig): Scanner[] {
  const scanners: Scanner[] = [new WiFiScanner(scan), new NetworkActivityScanner(scan)];
  if (config.demoScanner) scanners.push(new DemoScanner());
  return scanners;
}
