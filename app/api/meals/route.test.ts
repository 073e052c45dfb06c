import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryStore } from '@/test/memoryStore';
import { glycemicLoad } from '@/utils/units';
import { DELETE, GET as getNutrients } from './[id]/route';
import { GET, POST } from './route';

const { getStore } = vi.hoisted(() => ({ getStore: vi.fn() }));
vi.mock('@/utils/store', () => ({ getStore }));

describe('/api/meals', () => {
  let store: MemoryStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new MemoryStore();
    getStore.mockReturnValue(store);
  });

  it('saves a meal with normalised nutrients and a server-side GL', async () => {
    const res = await POST(
      new Request('http://localhost/api/meals', {
        method: 'POST',
        body: JSON.stringify({
          user_id: 'u1',
          food_name: 'Porridge',
          meal_type: 'Breakfast',
          nutrients: { Carbohydrate: '45 g', Energy: '850 kJ', Salt: '0.5 g' },
          gi: 55,
          insulin: 4,
          timestamp: '2024-03-10T08:00:00Z',
        }),
      })
    );

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body.status).toBe('success');
    expect(body.message).toBe('Meal saved');
    expect(body.data).toMatchObject({
      userId: 'u1',
      foodName: 'Porridge',
      mealType: 'breakfast',
      timestamp: '2024-03-10T08:00:00.000Z',
      carbs: 45,
      calories: 203.2,
      sodium: 200,
      gi: 55,
      gl: 24.8,
      insulin: 4,
    });
    expect(store.meals).toHaveLength(1);
  });

  it('computes GL from the carbs it stores', async () => {
    const res = await POST(
      new Request('http://localhost/api/meals', {
        method: 'POST',
        body: JSON.stringify({ user_id: 'u1', food_name: 'Rice', nutrients: { carbs: '12.345 g' }, gi: 80 }),
      })
    );

    expect(res.status).toBe(201);
    const { data } = await res.json();
    expect(data.carbs).toBe(12.3);
    expect(data.gl).toBe(9.8);
    expect(data.gl).toBe(glycemicLoad(data.gi, data.carbs));
  });

  it('rejects an unreadable timestamp', async () => {
    const res = await POST(
      new Request('http://localhost/api/meals', {
        method: 'POST',
        body: JSON.stringify({ user_id: 'u1', food_name: 'Porridge', timestamp: 'soon' }),
      })
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'timestamp must be an ISO-8601 date-time' });
  });

  it('deletes only the owner’s meal', async () => {
    const meal = store.addMeal('u1', { timestamp: new Date('2024-03-10T08:00:00Z') });
    const del = (userId: string, id: string) =>
      DELETE(new Request(`http://localhost/api/meals/${id}?user_id=${userId}`, { method: 'DELETE' }), {
        params: { id },
      });

    expect((await del('u2', meal.id)).status).toBe(403);
    expect((await del('u1', 'missing')).status).toBe(404);
    expect((await del('u1', meal.id)).status).toBe(204);
    expect(store.meals).toHaveLength(0);
  });

  describe('food diary', () => {
    const hoursAgo = (h: number) => new Date(Date.now() - h * 3_600_000);
    const list = async (query: string) => {
      const res = await GET(new Request(`http://localhost/api/meals?user_id=u1&${query}`));
      return { status: res.status, body: await res.json() };
    };
    const names = (body: { entries: Array<{ foodName: string }> }) => body.entries.map((e) => e.foodName);

    beforeEach(() => {
      store.addMeal('u1', { timestamp: hoursAgo(2), foodName: 'Porridge', mealType: 'breakfast', gi: 55, carbs: 45 });
      store.addMeal('u1', { timestamp: hoursAgo(25), foodName: 'White rice', mealType: 'lunch', gi: 73 });
      store.addMeal('u1', { timestamp: hoursAgo(240), foodName: 'Lentil soup', mealType: 'dinner', gi: 32 });
      store.addMeal('u2', { timestamp: hoursAgo(1), foodName: 'Porridge', mealType: 'breakfast', gi: 90 });
    });

    it('lists the user’s meals newest first on one page', async () => {
      const { status, body } = await list('');
      expect(status).toBe(200);
      expect(names(body)).toEqual(['Porridge', 'White rice', 'Lentil soup']);
      expect(body.entries[0]).toMatchObject({ userId: 'u1', gi: 55, gi_color: 'yellow' });
      expect(body.pagination).toEqual({
        page: 1,
        pages: 1,
        has_prev: false,
        has_next: false,
        prev_num: 0,
        next_num: 2,
      });
    });

    it('filters by time, GI band, meal type and name', async () => {
      expect(names((await list('time=24h')).body)).toEqual(['Porridge']);
      expect(names((await list('time=7d')).body)).toEqual(['Porridge', 'White rice']);
      expect(names((await list('gi=high')).body)).toEqual(['White rice']);
      expect(names((await list('gi=low')).body)).toEqual(['Porridge', 'Lentil soup']);
      expect(names((await list('gi=custom&gi_max=50')).body)).toEqual(['Lentil soup']);
      expect(names((await list('meal=Lunch')).body)).toEqual(['White rice']);
      expect(names((await list('food=RICE')).body)).toEqual(['White rice']);
    });

    it('sorts oldest first or by highest GI', async () => {
      expect(names((await list('sort=oldest')).body)).toEqual(['Lentil soup', 'White rice', 'Porridge']);
      expect(names((await list('sort=highest_gi')).body)).toEqual(['White rice', 'Porridge', 'Lentil soup']);
    });

    it('pages ten entries at a time', async () => {
      for (let i = 0; i < 9; i++) store.addMeal('u1', { timestamp: hoursAgo(300 + i), foodName: `Snack ${i}` });

      const first = (await list('page=1')).body;
      expect(first.entries).toHaveLength(10);
      expect(first.pagination).toMatchObject({ page: 1, pages: 2, has_prev: false, has_next: true });

      const second = (await list('page=2')).body;
      expect(names(second)).toEqual(['Snack 7', 'Snack 8']);
      expect(second.pagination).toMatchObject({ page: 2, pages: 2, has_prev: true, has_next: false });
    });

    it('formats entry dates in the requested zone', async () => {
      store.addMeal('u3', { timestamp: new Date('2024-03-09T19:05:00Z'), foodName: 'Late toast', gi: 75 });
      const res = await GET(new Request('http://localhost/api/meals?user_id=u3&tz=Asia/Kolkata'));
      const body = await res.json();
      expect(body.entries[0]).toMatchObject({
        foodName: 'Late toast',
        timestamp: '2024-03-09T19:05:00.000Z',
        display_date: '10 Mar 2024',
        display_time: '12:35 AM',
        gi_color: 'red',
      });
    });

    it('rejects unknown filter values', async () => {
      const { status, body } = await list('sort=calories');
      expect(status).toBe(400);
      expect(body.error).toMatch(/^Validation failed: sort: /);
      expect((await list('page=0')).body).toEqual({ error: 'Validation failed: page: page must be >= 1' });
    });
  });

  it('returns the nutrient breakdown of the owner’s meal', async () => {
    const meal = store.addMeal('u1', {
      timestamp: new Date('2024-03-10T08:00:00Z'),
      calories: 203.2,
      carbs: 45,
      protein: 6,
      fat: 3.5,
      fiber: 4,
      sodium: 200,
    });
    const get = (userId: string, id: string) =>
      getNutrients(new Request(`http://localhost/api/meals/${id}?user_id=${userId}`), { params: { id } });

    const res = await get('u1', meal.id);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      nutrients: [
        { name: 'Calories', value: 203.2, unit: 'kcal' },
        { name: 'Carbohydrates', value: 45, unit: 'g' },
        { name: 'Protein', value: 6, unit: 'g' },
        { name: 'Fat', value: 3.5, unit: 'g' },
        { name: 'Fiber', value: 4, unit: 'g' },
        { name: 'Sodium', value: 200, unit: 'mg' },
      ],
    });
    expect((await get('u2', meal.id)).status).toBe(403);
    expect((await get('u1', 'missing')).status).toBe(404);
  });
});
