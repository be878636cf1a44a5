// Health Types

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  timestamp: number;
  components: ComponentHealth[];
  system: {
    memoryUsed: number;
    nodeVersion: string;
    platform: string;
  };
}

export interface ComponentHealth {
  name: string;
  status: 'up' | 'down' | 'degraded';
  latency?: number;
  lastCheck: number;
  details?: Record<string, unknown>;
  error?: string;
}
