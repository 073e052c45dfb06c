import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryStore } from '@/test/memoryStore';
import { POST } from './route';

const { getStore } = vi.hoisted(() => ({ getStore: vi.fn() }));
vi.mock('@/utils/store', () => ({ getStore }));

const post = (body: unknown) =>
  POST(
    new Request('http://localhost/api/insulin/advice', {
      method: 'POST',
      body: typeof body === 'string' ? body : JSON.stringify(body),
    })
  );

describe('POST /api/insulin/advice', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
    store.addGlucose('u1', { timestamp: new Date(Date.now() - 5 * 60_000), value: 180 });
    getStore.mockReturnValue(store);
  });

  it('returns the dose breakdown', async () => {
    const res = await post({ user_id: 'u1', planned_carbs: 60, isf: 50, icr: 10 });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      meal_dose: 6,
      correction_dose: 1.6,
      iob_adjustment: 0,
      total_dose: 7.6,
      current_bg: 180,
      target_bg: 100,
      iob: 0,
      isf_used: 50,
      icr_used: 10,
      parameter_source: 'request',
    });
  });

  it('rejects negative carbs without dose fields', async () => {
    const res = await post({ user_id: 'u1', planned_carbs: -10 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'planned_carbs must be >= 0' });
  });

  it('rejects negative carbs before looking up CGM data', async () => {
    const res = await post({ user_id: 'u9', planned_carbs: -5 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'planned_carbs must be >= 0' });
  });

  it('rejects missing and non-positive fields', async () => {
    const missing = await post({ user_id: 'u1' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: 'Validation failed: planned_carbs: planned_carbs is required' });

    const zeroIsf = await post({ user_id: 'u1', planned_carbs: 30, isf: 0 });
    expect(await zeroIsf.json()).toEqual({ error: 'Validation failed: isf: isf must be > 0' });
  });

  it('rejects a body that is not JSON', async () => {
    const res = await post('{planned_carbs:');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body must be valid JSON' });
  });

  it('answers 404 without CGM data', async () => {
    const res = await post({ user_id: 'u2', planned_carbs: 30 });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'No CGM data available. Please sync your sensor first.' });
  });
});
