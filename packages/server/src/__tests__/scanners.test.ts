import { describe, it, expect, vi, afterEach } from 'vitest';
import { DemoScanner } from '../scanners/demo.js';
import { createScanners } from '../scanners/index.js';
import { SCAN_CONFIG } from './helpers.js';

describe('DemoScanner', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('produces synthetic detections after a short delay', async () => {
    vi.useFakeTimers();
    const scanner = new DemoScanner(2, () => 0, 150);
    const pending = scanner.scan(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(150);
    expect(await pending).toEqual([
      { kind: 'WiFi', name: 'MyWiFi_5G', strength: 40, distance: 1, source: 'Demo Scanner' },
      { kind: 'WiFi', name: 'MyWiFi_5G', strength: 40, distance: 1, source: 'Demo Scanner' },
    ]);
  });

  it('rejects once aborted', async () => {
    const controller = new AbortController();
    const pending = new DemoScanner(1, () => 0, 10_000).scan(controller.signal);
    controller.abort(new Error('cancelled'));
    await expect(pending).rejects.toThrow('cancelled');
  });
});

describe('createScanners', () => {
  it('adds the demo scanner only when asked', () => {
    expect(createScanners({ demoScanner: false }, SCAN_CONFIG).map((s) => s.name())).toEqual(['WiFi Scanner', 'Network Interface Scanner']);
    expect(createScanners({ demoScanner: true }, SCAN_CONFIG).map((s) => s.name())).toContain('Demo Scanner');
  });
});
