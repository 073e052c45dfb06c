import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryStore } from '@/test/memoryStore';
import { UpstreamUnavailableError } from '@/utils/error';
import { GET } from './route';

const { getStore } = vi.hoisted(() => ({ getStore: vi.fn() }));
vi.mock('@/utils/store', () => ({ getStore }));

const get = (query: string) => GET(new Request(`http://localhost/api/dashboard/daily?${query}`));

describe('GET /api/dashboard/daily', () => {
  let store: MemoryStore;

  beforeEach(() => {
    vi.restoreAllMocks();
    store = new MemoryStore();
    getStore.mockReturnValue(store);
  });

  it('aggregates the requested day in the requested zone', async () => {
    store.addMeal('u1', { timestamp: new Date('2024-03-12T19:00:00Z'), foodName: 'Toast', carbs: 30, gl: 15, calories: 180 });
    const res = await get('user_id=u1&date=2024-03-13&tz=Asia/Kolkata');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      glycaemic_load: 15,
      average_glycaemic_load: 15,
      carbohydrates: 30,
      calories: 180,
      food_entries: [{ time: '00:30', food: 'Toast', gl: 15 }],
      line_labels: ['00:30'],
      line_carb: [30],
      line_gl: [15],
      line_calories: [180],
    });
  });

  it('validates the query', async () => {
    const noUser = await get('date=2024-03-13');
    expect(noUser.status).toBe(400);
    expect(await noUser.json()).toEqual({ error: 'Missing user_id' });

    const badZone = await get('user_id=u1&tz=Nowhere/City');
    expect(await badZone.json()).toEqual({ error: 'Unknown time zone: Nowhere/City' });

    const badDate = await get('user_id=u1&date=2024-13-01');
    expect(badDate.status).toBe(400);
  });

  it('answers a store outage with the zeroed payload', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(store, 'listMeals').mockRejectedValue(new UpstreamUnavailableError('store', 'Database error during listMeals: timeout'));
    const res = await get('user_id=u1&date=2024-03-13');
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      glycaemic_load: 0,
      average_glycaemic_load: 0,
      carbohydrates: 0,
      calories: 0,
      food_entries: [],
      line_labels: ['--'],
      line_carb: [0],
      line_gl: [0],
      line_calories: [0],
      error: 'Database error during listMeals: timeout',
    });
  });
});
