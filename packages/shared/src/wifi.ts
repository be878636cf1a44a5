// WiFi Scan Types

export interface WiFiNetwork {
  ssid: string;
  bssid?: string;
  rssi?: number;          // dBm, when the tool reports it
  signalPercent: number;  // 0-100
  channel?: number;
  security?: string;
}

export type WiFiTool = 'nmcli' | 'iw' | 'airport';
