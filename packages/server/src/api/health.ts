import type { ComponentHealth, CoordinatorStatus, CollectionSource, HealthStatus } from '@radarscope/shared';

export const SERVER_VERSION = '0.1.0';

export interface HealthInputs {
  coordinator: CoordinatorStatus;
  collectorSource: CollectionSource;
  dataMode: 'real' | 'simulated';
  now: number;
}

function scannerComponents(status: CoordinatorStatus, now: number): ComponentHealth[] {
  return status.scanners.map((s): ComponentHealth => ({
    name: s.name,
    status: !s.available ? 'down' : s.lastOutcome === undefined || s.lastOutcome === 'ok' ? 'up' : 'degraded',
    latency: s.lastDurationMs,
    lastCheck: status.lastScanAt ?? now,
    details: { detections: s.lastDetections, failures: s.failures },
    error: s.lastError,
  }));
}

/**
 * Simulated mode is always healthy. In real mode the radar is degraded while
 * it serves cached or fallback data, and unhealthy when it has nothing.
 */
export function buildHealth({ coordinator, collectorSource, dataMode, now }: HealthInputs): HealthStatus {
  let status: HealthStatus['status'] = 'healthy';
  if (dataMode === 'real') {
    if (collectorSource === 'empty') status = 'unhealthy';
    else if (collectorSource !== 'live' && collectorSource !== 'cache') status = 'degraded';
  }

  const collector: ComponentHealth = {
    name: 'Real Data Collector',
    status: collectorSource === 'live' || collectorSource === 'cache' ? 'up' : collectorSource === 'fallback' ? 'degraded' : 'down',
    lastCheck: now,
    details: { source: collectorSource, dataMode },
  };

  return {
    status,
    version: SERVER_VERSION,
    uptime: process.uptime(),
    timestamp: now,
    components: [collector, ...scannerComponents(coordinator, now)],
    system: {
      memoryUsed: process.memoryUsage().heapUsed,
      nodeVersion: process.version,
      platform: process.platform,
    },
  };
}
