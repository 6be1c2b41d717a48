import type { Page } from 'playwright';
import { describe, expect, test, vi } from 'vitest';
import { STABILITY_SCRIPTS, StabilityMonitor } from '../../../src/engine/StabilityMonitor.js';

// ── Scripted page ─────────────────────────────────────────────────────────

/**
 * A page whose mutation log is scripted against a fake clock. The clock only
 * advances inside waitForTimeout, like a real poll loop.
 */
function scriptedPage(opts: { mutationsAt?: number[]; installs?: boolean; closed?: boolean } = {}) {
  const clock = { t: 0 };
  const mutationsAt = opts.mutationsAt ?? [];

  const evaluate = vi.fn().mockImplementation((script: string) => {
    if (script === STABILITY_SCRIPTS.install) return Promise.resolve(opts.installs ?? true);
    if (script === STABILITY_SCRIPTS.read) {
      const seen = mutationsAt.filter((m) => m <= clock.t);
      const lastCritical = seen.length ? Math.max(...seen) : -1_000_000;
      return Promise.resolve({ now: clock.t, lastCritical, mutations: seen.length });
    }
    return Promise.resolve(undefined);
  });
  const waitForTimeout = vi.fn().mockImplementation((ms: number) => {
    clock.t += ms;
    return Promise.resolve();
  });
  const waitForLoadState = vi.fn().mockResolvedValue(undefined);
  const page = { evaluate, waitForTimeout, waitForLoadState, isClosed: () => opts.closed ?? false } as unknown as Page;

  return { page, clock, evaluate, waitForTimeout, waitForLoadState };
}

const options = { quietWindowMs: 1_000, timeoutMs: 10_000, pollIntervalMs: 250 };

// ── Tests ─────────────────────────────────────────────────────────────────

describe('StabilityMonitor', () => {
  test('waits for a full quiet window after the last scripted mutation', async () => {
    const { page, clock, waitForLoadState } = scriptedPage({ mutationsAt: [0, 800, 1_600, 2_400] });
    const monitor = new StabilityMonitor(options, () => clock.t);

    const result = await monitor.waitForStable(page);

    expect(result).toEqual({ stable: true, via: 'mutations', waitedMs: 3_500 });
    expect(waitForLoadState).toHaveBeenCalledOnce();
    expect(waitForLoadState).toHaveBeenCalledWith('networkidle', { timeout: 1_000 });
  });

  test('is stable at once on a page that has been quiet', async () => {
    const { page, clock } = scriptedPage({ mutationsAt: [] });
    const monitor = new StabilityMonitor(options, () => clock.t);

    await expect(monitor.waitForStable(page)).resolves.toEqual({ stable: true, via: 'mutations', waitedMs: 0 });
  });

  test('times out while mutations keep arriving', async () => {
    const constant = Array.from({ length: 50 }, (_, i) => i * 100);
    const { page, clock } = scriptedPage({ mutationsAt: constant });
    const monitor = new StabilityMonitor({ ...options, timeoutMs: 1_000 }, () => clock.t);

    const result = await monitor.waitForStable(page);

    expect(result).toEqual({
      stable: false,
      kind: 'timeout',
      message: 'no 1000ms quiet window within 1000ms',
      waitedMs: 1_000,
    });
  });

  test('keeps polling when the network is still busy after a quiet DOM', async () => {
    const { page, clock, evaluate, waitForLoadState } = scriptedPage({ mutationsAt: [] });
    waitForLoadState.mockRejectedValueOnce(new Error('Timeout 1000ms exceeded.'));
    const monitor = new StabilityMonitor(options, () => clock.t);

    const result = await monitor.waitForStable(page);

    expect(result).toEqual({ stable: true, via: 'mutations', waitedMs: 250 });
    expect(evaluate).toHaveBeenCalledWith(STABILITY_SCRIPTS.reset);
    expect(waitForLoadState).toHaveBeenCalledTimes(2);
  });

  test('falls back to network idle when the observer cannot be installed', async () => {
    const { page, clock, waitForLoadState, waitForTimeout } = scriptedPage({ installs: false });
    const monitor = new StabilityMonitor(options, () => clock.t);

    const result = await monitor.waitForStable(page);

    expect(result).toEqual({ stable: true, via: 'fallback', waitedMs: 1_000 });
    expect(waitForLoadState).toHaveBeenCalledWith('networkidle', { timeout: 5_000 });
    expect(waitForTimeout).toHaveBeenCalledWith(1_000);
  });

  test('reports a closed page as detached', async () => {
    const { page, clock, evaluate } = scriptedPage({ closed: true });
    const monitor = new StabilityMonitor(options, () => clock.t);

    const result = await monitor.waitForStable(page);

    expect(result).toMatchObject({ stable: false, kind: 'detached' });
    expect(evaluate).not.toHaveBeenCalled();
  });

  test('honours per-call overrides', async () => {
    const { page, clock } = scriptedPage({ mutationsAt: [0] });
    const monitor = new StabilityMonitor(options, () => clock.t);

    await expect(monitor.waitForStable(page, { quietWindowMs: 500 })).resolves.toEqual({
      stable: true,
      via: 'mutations',
      waitedMs: 500,
    });
  });
});
