import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { loadConfig, signalLimits, toScanConfig } from './config/settings.js';
import { ScanCoordinator, type ScanSummary } from './scanner/coordinator.js';
import { RealDataCollector } from './collector/service.js';
import { RadarEngine } from './radar/engine.js';
import { createScanners } from './scanners/index.js';
import { createRadarRouter } from './api/routes.js';
import { attachRadarSocket } from './api/socket.js';
import { buildHealth } from './api/health.js';
import { describeError } from './util/errors.js';
import { createLogger } from './util/log.js';

const log = createLogger('🎯 [Server]');

function readConfig() {
  try {
    return loadConfig();
  } catch (err) {
    log.error(describeError(err));
    process.exit(1);
  }
}

const config = readConfig();

const scanConfig = toScanConfig(config);

// ── Data acquisition ───────────────────────────────────────────────────
const coordinator = new ScanCoordinator(scanConfig);
for (const scanner of createScanners(config, scanConfig)) coordinator.register(scanner);

const collector = new RealDataCollector(coordinator, scanConfig, {
  useSimulatedFallback: config.useSimulatedFallback,
  limits: signalLimits(config),
});

const engine = new RadarEngine(config, { feed: collector });

// ============================================================================
// HTTP + WebSocket
// ============================================================================

const app = express();
app.use(cors());
app.use(express.json());

const server = createServer(app);
const socket = attachRadarSocket(server, engine);

app.get('/api/health', (_req, res) => {
  res.json(buildHealth({
    coordinator: coordinator.getStatus(),
    collectorSource: collector.getLastSource(),
    dataMode: engine.getDataMode(),
    now: Date.now(),
  }));
});

app.use('/api', createRadarRouter({ engine, coordinator, collector }));

coordinator.on('scan_complete', (summary: ScanSummary) => socket.broadcast({ type: 'scan_complete', summary }));
collector.on('degraded', (err: Error) => socket.broadcast({ type: 'degraded', message: err.message }));

// ── Tick loop ──────────────────────────────────────────────────────────
const tickTimer = setInterval(() => {
  engine.tick();
  if (socket.clientCount() > 0) socket.broadcast({ type: 'radar_frame', frame: engine.frame() });
}, config.refreshRate);

// ── Shutdown ───────────────────────────────────────────────────────────
let stopping = false;

async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  log.info(`${signal} received, shutting down`);
  clearInterval(tickTimer);
  await socket.close();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await coordinator.whenIdle();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error(`Shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
  });
}

server.listen(config.port, '0.0.0.0', () => {
  const scanners = coordinator.getScannerNames();
  console.log(`
  🎯 ╔═══════════════════════════════════════╗
  🎯 ║          R A D A R S C O P E          ║
  🎯 ║   Sweep · Persistence · Aggregation   ║
  🎯 ╠═══════════════════════════════════════╣
  🎯 ║  HTTP:  http://0.0.0.0:${config.port}
  🎯 ║  WS:    ws://0.0.0.0:${config.port}/ws
  🎯 ║  Mode:  ${engine.getDataMode()}
  🎯 ║  Scanners: ${scanners.length ? scanners.join(', ') : 'none (fallback data)'}
  🎯 ╚═══════════════════════════════════════╝
  `);
});
