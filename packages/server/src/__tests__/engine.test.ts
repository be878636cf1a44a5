import { describe, it, expect, vi } from 'vitest';
import {
  RadarEngine, MAX_SWEEP_SPEED, MIN_SWEEP_SPEED, SWEEP_SPEED_STEP, type EngineConfig, type SignalFeed,
} from '../radar/engine.js';
import type { CollectionResult } from '../collector/service.js';
import type { Signal } from '../signal/model.js';
import { flushPromises, makeSignal } from './helpers.js';

const BASE: EngineConfig = {
  sweepSpeed: Math.PI / 30,
  beamWidth: Math.PI / 60,
  maxSignals: 8,
  signalLifetime: 30_000,
  maxPhase: 8,
  historyUpdateRate: 0.5,
  maxHistory: 20,
  maxScanRange: 10,
  minDistance: 0.5,
  useRealData: false,
};

/** Beam wider than π: every signal is under it on every tick. */
const ALWAYS_LIT = Math.PI + 1;

function setup(config: Partial<EngineConfig>, initialSignals: Signal[], random = () => 0.99, feed?: SignalFeed) {
  let now = 0;
  const engine = new RadarEngine({ ...BASE, ...config }, { clock: () => now, random, initialSignals, feed });
  return {
    engine,
    at(t: number) {
      now = t;
      engine.tick();
    },
  };
}

function view(engine: RadarEngine, id: string) {
  return engine.frame().signals.find((s) => s.id === id);
}

describe('RadarEngine', () => {
  describe('signal lifecycle', () => {
    it('removes a signal once it outlives signalLifetime, even while illuminated', () => {
      const { engine, at } = setup({ beamWidth: ALWAYS_LIT }, [makeSignal({ id: 'w1', createdAt: 0 })]);

      for (let t = 1_000; t <= 30_000; t += 1_000) at(t);
      expect(engine.hasSignal('w1')).toBe(true);

      at(31_000);
      at(32_000);
      expect(engine.hasSignal('w1')).toBe(false);
    });

    it('illuminates signals under the beam and decays the rest', () => {
      const lit = makeSignal({ id: 'lit', angle: 0.01, createdAt: 0 });
      const dark = makeSignal({ id: 'dark', angle: Math.PI, createdAt: 0 });
      const { engine, at } = setup({ sweepSpeed: MIN_SWEEP_SPEED }, [lit, dark], () => 0.5);

      at(1_000);

      expect(view(engine, 'lit')?.persistence).toBe(1);
      expect(view(engine, 'lit')?.lastIlluminatedAt).toBe(1_000);
      expect(view(engine, 'dark')?.persistence).toBe(0.875);
    });

    it('judges every signal against the sweep angle at the start of the tick', () => {
      const ahead = makeSignal({ id: 'ahead', angle: MAX_SWEEP_SPEED, createdAt: 0 });
      const { engine, at } = setup({ sweepSpeed: MAX_SWEEP_SPEED }, [ahead], () => 0.5);

      at(1_000);
      expect(view(engine, 'ahead')?.persistence).toBe(0.875);
      expect(engine.getSweepAngle()).toBeCloseTo(MAX_SWEEP_SPEED, 12);

      at(1_100);
      expect(view(engine, 'ahead')?.persistence).toBe(1);
    });

    it('drops faded signals at the management tick', () => {
      const faded = makeSignal({ id: 'faded', angle: Math.PI, createdAt: 0, lastIlluminatedAt: -8_000 });
      const { engine, at } = setup({}, [faded, makeSignal({ id: 'fresh', angle: 0.01 })], () => 0.5);
      const dropped = vi.fn();
      engine.on('signals_dropped', dropped);

      at(1_000);
      expect(engine.signalCount()).toBe(2);
      expect(view(engine, 'faded')).toBeUndefined();

      at(2_000);
      expect(engine.hasSignal('faded')).toBe(false);
      expect(dropped).toHaveBeenCalledWith(1);
    });

    it('synthesizes a signal at a management tick when below capacity', () => {
      const { engine, at } = setup({ beamWidth: ALWAYS_LIT }, [], () => 0.2);
      at(2_000);
      expect(engine.signalCount()).toBe(1);
      expect(engine.frame().signals[0]).toMatchObject({ origin: 'simulated', name: 'SIM-Bluetooth' });
    });

    it('records history at the configured rate', () => {
      const { engine, at } = setup({ beamWidth: ALWAYS_LIT }, [makeSignal({ id: 'h1' })]);
      at(400);
      expect(view(engine, 'h1')?.history).toHaveLength(0);
      at(500);
      at(700);
      at(1_000);
      expect(view(engine, 'h1')?.history.map((p) => p.timestamp)).toEqual([500, 1_000]);
    });

    it('seeds a simulated population when none is given', () => {
      const engine = new RadarEngine(BASE, { clock: () => 0, random: () => 0.5 });
      const kinds = engine.frame().signals.map((s) => s.kind);
      expect(kinds).toEqual(['WiFi', 'Bluetooth', 'Cellular', 'Radio', 'IoT', 'Satellite']);
    });
  });

  describe('real data merge', () => {
    function fakeFeed() {
      let generation = 1;
      let n = 0;
      const feed = {
        collect: vi.fn(async (): Promise<CollectionResult> => ({
          signals: [makeSignal({ id: `real-${++n}`, origin: 'real' })],
          generation,
          source: 'live',
          collectedAt: 0,
        })),
        cachedSignals: vi.fn((): Signal[] => [makeSignal({ id: 'cached-a', origin: 'real' }), makeSignal({ id: 'cached-b', origin: 'real' })]),
        getGeneration: vi.fn(() => generation),
        setGeneration(g: number) { generation = g; },
      };
      return feed;
    }

    it('merges each collector generation exactly once', async () => {
      const feed = fakeFeed();
      const { engine, at } = setup({ beamWidth: ALWAYS_LIT, useRealData: true }, [], () => 0.99, feed);
      expect(feed.collect).toHaveBeenCalledTimes(1);
      await flushPromises();

      at(2_000);
      expect(engine.signalCount()).toBe(1);
      await flushPromises();

      feed.setGeneration(2);
      at(4_000);
      expect(engine.signalCount()).toBe(1);
      await flushPromises();

      at(6_000);
      expect(engine.signalCount()).toBe(2);
      expect(feed.collect).toHaveBeenCalledTimes(4);
    });

    it('keeps the newest signals when a merge overflows maxSignals', async () => {
      const feed = fakeFeed();
      const seed = [makeSignal({ id: 'old-1' }), makeSignal({ id: 'old-2' })];
      const { engine, at } = setup({ beamWidth: ALWAYS_LIT, useRealData: true, maxSignals: 2 }, seed, () => 0.99, feed);
      await flushPromises();

      at(2_000);
      expect(engine.frame().signals.map((s) => s.id)).toEqual(['old-2', 'real-1']);
    });

    it('adopts cached signals when switching to real data', () => {
      const feed = fakeFeed();
      const { engine } = setup({}, [makeSignal({ id: 'sim-a' })], () => 0.5, feed);
      expect(feed.collect).not.toHaveBeenCalled();

      engine.apply({ type: 'toggle_real_data' });
      expect(engine.getDataMode()).toBe('real');
      expect(engine.frame().signals.map((s) => s.id)).toEqual(['cached-a', 'cached-b']);
      expect(feed.collect).toHaveBeenCalledTimes(1);

      engine.apply({ type: 'toggle_real_data' });
      expect(engine.getDataMode()).toBe('simulated');
      expect(engine.frame().signals.every((s) => s.origin === 'simulated')).toBe(true);
    });

    it('logs and survives a failed collection', async () => {
      const feed = fakeFeed();
      feed.collect.mockRejectedValueOnce(new Error('collector exploded'));
      const { engine, at } = setup({ beamWidth: ALWAYS_LIT, useRealData: true }, [], () => 0.99, feed);
      await flushPromises();

      at(2_000);
      expect(engine.signalCount()).toBe(0);
      expect(feed.collect).toHaveBeenCalledTimes(2);
    });
  });

  describe('controls', () => {
    it('bounds the sweep speed', () => {
      const { engine } = setup({}, []);
      engine.apply({ type: 'speed_up' });
      expect(engine.getSweepSpeed()).toBeCloseTo((Math.PI / 30) * SWEEP_SPEED_STEP, 12);
      for (let i = 0; i < 30; i++) engine.apply({ type: 'speed_up' });
      expect(engine.getSweepSpeed()).toBe(MAX_SWEEP_SPEED);
      for (let i = 0; i < 60; i++) engine.apply({ type: 'slow_down' });
      expect(engine.getSweepSpeed()).toBe(MIN_SWEEP_SPEED);
    });

    it('freezes the sweep and the decay while paused', () => {
      const { engine, at } = setup({}, [makeSignal({ id: 'p', angle: Math.PI })], () => 0.5);
      engine.apply({ type: 'toggle_pause' });
      at(4_000);
      expect(engine.isPaused()).toBe(true);
      expect(engine.getSweepAngle()).toBe(0);
      expect(view(engine, 'p')?.persistence).toBe(1);
    });

    it('filters signals by kind and keeps the all flag consistent', () => {
      const { engine } = setup({}, [
        makeSignal({ id: 'w', kind: 'WiFi' }),
        makeSignal({ id: 'b', kind: 'Bluetooth' }),
      ]);

      engine.apply({ type: 'toggle_filter', kind: 'WiFi' });
      let frame = engine.frame();
      expect(frame.signals.map((s) => s.id)).toEqual(['b']);
      expect(frame.filters.all).toBe(false);
      expect(frame.counts.WiFi).toBe(0);
      expect(frame.counts.Bluetooth).toBe(1);
      expect(frame.totalSignals).toBe(2);

      engine.apply({ type: 'toggle_filter', kind: 'WiFi' });
      expect(engine.getFilters().all).toBe(true);

      engine.apply({ type: 'toggle_all_filters' });
      frame = engine.frame();
      expect(frame.signals).toEqual([]);
      expect(frame.filters).toMatchObject({ all: false, WiFi: false, Network: false });
    });

    it('cycles the selection through visible signals by id', () => {
      const { engine } = setup({}, [makeSignal({ id: 'a' }), makeSignal({ id: 'b' }), makeSignal({ id: 'c' })]);

      engine.apply({ type: 'select_next' });
      expect(engine.frame()).toMatchObject({ selectedSignalId: 'a', selectedSignalIndex: 0 });
      engine.apply({ type: 'select_previous' });
      expect(engine.frame()).toMatchObject({ selectedSignalId: 'c', selectedSignalIndex: 2 });
      engine.apply({ type: 'select_next' });
      expect(engine.frame().selectedSignalId).toBe('a');
      engine.apply({ type: 'clear_selection' });
      expect(engine.frame()).toMatchObject({ selectedSignalId: null, selectedSignalIndex: -1 });
    });

    it('clears the selection when nothing is visible', () => {
      const { engine } = setup({}, [makeSignal({ id: 'a' })]);
      engine.apply({ type: 'select_next' });
      engine.apply({ type: 'toggle_all_filters' });
      engine.apply({ type: 'select_next' });
      expect(engine.frame().selectedSignalId).toBeNull();
    });

    it('toggles display options', () => {
      const { engine } = setup({}, []);
      engine.apply({ type: 'toggle_trails' });
      engine.apply({ type: 'toggle_names' });
      engine.apply({ type: 'toggle_info' });
      expect(engine.frame().display).toEqual({ showTrails: false, showNames: true, showInfoPanel: true });
    });

    it('resets the sweep, pause state and population', () => {
      const { engine, at } = setup({}, [], () => 0.5);
      at(100);
      engine.apply({ type: 'toggle_pause' });
      engine.apply({ type: 'reset' });
      expect(engine.getSweepAngle()).toBe(0);
      expect(engine.isPaused()).toBe(false);
      expect(engine.signalCount()).toBe(6);
    });

    it('announces every command', () => {
      const { engine } = setup({}, []);
      const seen = vi.fn();
      engine.on('command', seen);
      engine.apply({ type: 'speed_up' });
      expect(seen).toHaveBeenCalledWith({ type: 'speed_up' });
    });
  });

  it('reports frame statistics', () => {
    const { engine, at } = setup({}, []);
    at(100);
    at(200);
    at(300);
    const { stats } = engine.frame();
    expect(stats.frames).toBe(3);
    expect(stats.frameRate).toBeCloseTo(10, 6);
    expect(stats.avgTickMs).toBeGreaterThanOrEqual(0);
  });
});
