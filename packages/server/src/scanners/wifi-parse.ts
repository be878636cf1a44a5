// ============================================================================
// RadarScope — WiFi tool output parsers (nmcli, iw, airport)
// ============================================================================
import type { WiFiNetwork } from '@radarscope/shared';
import { rssiToStrength } from '../signal/geometry.js';

const BSSID = /([0-9a-f]{2}(?::[0-9a-f]{2}){5})/i;

/** Splits one `nmcli -t` line on unescaped colons. */
export function splitTerse(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '\\' && i + 1 < line.length) {
      current += line[i + 1];
      i++;
    } else if (ch === ':') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isFinite(n) ? n : undefined;
}

/** `nmcli -t -f SSID,BSSID,SIGNAL,CHAN,SECURITY dev wifi list` */
export function parseNmcli(output: string): WiFiNetwork[] {
  const networks: WiFiNetwork[] = [];
  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    const [ssid, bssid, signal, chan, security] = splitTerse(line);
    const percent = optionalInt(signal);
    if (!ssid || ssid === '--' || percent === undefined) continue;
    networks.push({
      ssid,
      bssid: bssid || undefined,
      signalPercent: Math.max(0, Math.min(100, percent)),
      channel: optionalInt(chan),
      security: security || undefined,
    });
  }
  return networks;
}

/** First wireless interface named in `iw dev`. */
export function parseIwInterface(output: string): string | undefined {
  for (const line of output.split('\n')) {
    const match = /^\s*Interface\s+(\S+)/.exec(line);
    if (match) return match[1];
  }
  return undefined;
}

/** `iw <dev> scan`: one block per `BSS` header. */
export function parseIwScan(output: string): WiFiNetwork[] {
  const networks: WiFiNetwork[] = [];
  let current: { bssid: string; ssid?: string; rssi?: number; channel?: number } | null = null;

  const flush = () => {
    if (current?.ssid && current.rssi !== undefined) {
      networks.push({
        ssid: current.ssid,
        bssid: current.bssid,
        rssi: current.rssi,
        signalPercent: rssiToStrength(current.rssi),
        channel: current.channel,
      });
    }
  };

  for (const raw of output.split('\n')) {
    const line = raw.trim();
    const header = /^BSS\s+([0-9a-f:]{17})/i.exec(line);
    if (header) {
      flush();
      current = { bssid: header[1].toLowerCase() };
      continue;
    }
    if (!current) continue;
    if (line.startsWith('SSID:')) {
      current.ssid = line.slice(5).trim();
    } else if (line.startsWith('signal:')) {
      const rssi = parseFloat(line.slice(7));
      if (Number.isFinite(rssi)) current.rssi = Math.round(rssi);
    } else {
      const channel = /^(?:DS Parameter set: channel|\* primary channel:)\s*(\d+)/.exec(line);
      if (channel) current.channel = parseInt(channel[1], 10);
    }
  }
  flush();
  return networks;
}

/** macOS `airport -s`: SSID (right aligned), BSSID, RSSI, CHANNEL, HT, CC, SECURITY. */
export function parseAirport(output: string): WiFiNetwork[] {
  const networks: WiFiNetwork[] = [];
  const row = new RegExp(`^\\s*(.+?)\\s+${BSSID.source}\\s+(-?\\d+)\\s+(\\S+)(?:\\s+\\S+\\s+\\S+\\s+(.+))?$`, 'i');
  for (const line of output.split('\n')) {
    if (!line.trim() || (line.includes('BSSID') && line.includes('RSSI'))) continue;
    const match = row.exec(line);
    if (!match) continue;
    const rssi = parseInt(match[3], 10);
    networks.push({
      ssid: match[1].trim(),
      bssid: match[2].toLowerCase(),
      rssi,
      signalPercent: rssiToStrength(rssi),
      channel: optionalInt(match[4]),
      security: match[5]?.trim() || undefined,
    });
  }
  return networks;
}
