// ============================================================================
// RadarScope — WiFi Scanner
// nmcli or iw on Linux, airport on macOS. Each subprocess is tied to the
// coordinator's abort signal.
// ============================================================================
import type { DetectedSignal, ScanConfig, WiFiNetwork, WiFiTool } from '@radarscope/shared';
import type { Scanner } from '../scanner/types.js';
import { rssiToDistance, strengthToDistance } from '../signal/geometry.js';
import { commandExists, runCommand, type CommandProbe, type CommandRunner } from './exec.js';
import { parseAirport, parseIwInterface, parseIwScan, parseNmcli } from './wifi-parse.js';

export const AIRPORT_PATH = '/System/Library/PrivateFrameworks/Apple80211.framework/Versions/Current/Resources/airport';
const COMMAND_TIMEOUT_MS = 4_000;

export interface WiFiScannerOptions {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  probe?: CommandProbe;
}

export class WiFiScanner implements Scanner {
  private tool: WiFiTool | null = null;
  private hasIw = false;
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;
  private readonly probe: CommandProbe;

  constructor(private readonly config: ScanConfig, options: WiFiScannerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? runCommand;
    this.probe = options.probe ?? commandExists;
  }

  name(): string { return 'WiFi Scanner'; }

  getTool(): WiFiTool | null { return this.tool; }

  isAvailable(): boolean {
    this.tool = this.detectTool();
    return this.tool !== null;
  }

  private detectTool(): WiFiTool | null {
    if (this.platform === 'linux') {
      const nmcli = this.probe('nmcli');
      this.hasIw = this.probe('iw');
      if (nmcli) return 'nmcli';
      return this.hasIw ? 'iw' : null;
    }
    if (this.platform === 'darwin' && this.probe(AIRPORT_PATH)) return 'airport';
    return null;
  }

  async scan(signal: AbortSignal): Promise<DetectedSignal[]> {
    const networks = await this.listNetworks(signal);
    return networks
      .slice(0, this.config.maxSignals)
      .map((network) => this.toDetection(network));
  }

  private async listNetworks(signal: AbortSignal): Promise<WiFiNetwork[]> {
    switch (this.tool) {
      case 'nmcli': {
        const out = await this.run('nmcli', ['-t', '-f', 'SSID,BSSID,SIGNAL,CHAN,SECURITY', 'dev', 'wifi', 'list'], signal, COMMAND_TIMEOUT_MS);
        const networks = parseNmcli(out);
        // NetworkManager may be installed without managing the radio
        if (networks.length > 0 || !this.hasIw) return networks;
        return this.scanWithIw(signal);
      }
      case 'iw':
        return this.scanWithIw(signal);
      case 'airport':
        return parseAirport(await this.run(AIRPORT_PATH, ['-s'], signal, COMMAND_TIMEOUT_MS));
      default:
        return [];
    }
  }

  private async scanWithIw(signal: AbortSignal): Promise<WiFiNetwork[]> {
    const iface = parseIwInterface(await this.run('iw', ['dev'], signal, COMMAND_TIMEOUT_MS));
    if (!iface) return [];
    return parseIwScan(await this.run('iw', [iface, 'scan'], signal, COMMAND_TIMEOUT_MS));
  }

  private toDetection(network: WiFiNetwork): DetectedSignal {
    const distance = network.rssi !== undefined
      ? rssiToDistance(network.rssi, this.config.maxScanRange)
      : strengthToDistance(network.signalPercent, this.config.maxScanRange);
    return {
      kind: 'WiFi',
      name: network.ssid,
      strength: network.signalPercent,
      distance,
      source: this.name(),
    };
  }
}
