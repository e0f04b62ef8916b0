import { TimerStore, findInconsistency } from '../../../src/domain/timers/TimerStore';
import { CorruptStateError } from '../../../src/domain/errors';
import { MemoryStorage } from '../../helpers/fakes';

const KEY = '/tmp/worklog.state.json';

describe('TimerStore', () => {
  function makeStore() {
    const storage = new MemoryStorage();
    return { storage, store: new TimerStore(storage, KEY) };
  }

  test('load returns an empty list when nothing was saved', async () => {
    const { store } = makeStore();
    await expect(store.load()).resolves.toEqual([]);
  });

  test('save then load keeps order and the running sentinel', async () => {
    const { store, storage } = makeStore();
    const records = [
      { start: Date.UTC(2026, 9, 19, 8, 0, 0), end: Date.UTC(2026, 9, 19, 9, 30, 0) },
      { start: Date.UTC(2026, 9, 19, 10, 0, 0), end: null },
    ];
    await store.save(records);

    expect(JSON.parse(storage.files.get(KEY) ?? '')).toEqual({
      version: 1,
      timers: [
        { start: '2026-10-19T08:00:00.000Z', end: '2026-10-19T09:30:00.000Z' },
        { start: '2026-10-19T10:00:00.000Z', end: null },
      ],
    });
    await expect(store.load()).resolves.toEqual(records);
  });

  test('save overwrites prior state', async () => {
    const { store } = makeStore();
    await store.save([{ start: 1000, end: 2000 }, { start: 3000, end: 4000 }]);
    await store.save([{ start: 5000, end: null }]);
    await expect(store.load()).resolves.toEqual([{ start: 5000, end: null }]);
  });

  test('clear removes everything and is idempotent', async () => {
    const { store, storage } = makeStore();
    await store.save([{ start: 1000, end: null }]);
    await store.clear();
    await store.clear();
    expect(storage.files.has(KEY)).toBe(false);
    await expect(store.load()).resolves.toEqual([]);
  });

  test('a blank file counts as empty state', async () => {
    const { store, storage } = makeStore();
    storage.files.set(KEY, '  \n');
    await expect(store.load()).resolves.toEqual([]);
  });

  test('invalid JSON is a CorruptStateError', async () => {
    const { store, storage } = makeStore();
    storage.files.set(KEY, '{"version":1,');
    await expect(store.load()).rejects.toBeInstanceOf(CorruptStateError);
    await expect(store.load()).rejects.toThrow(/not valid JSON/);
  });

  test('missing fields are a CorruptStateError', async () => {
    const { store, storage } = makeStore();
    storage.files.set(KEY, JSON.stringify({ version: 1, timers: [{ start: '2026-10-19T08:00:00.000Z' }] }));
    await expect(store.load()).rejects.toThrow(/timers\.0\.end/);
  });

  test('a persisted record that ends before it starts is a CorruptStateError', async () => {
    const { store, storage } = makeStore();
    storage.files.set(
      KEY,
      JSON.stringify({
        version: 1,
        timers: [{ start: '2026-10-19T09:00:00.000Z', end: '2026-10-19T08:00:00.000Z' }],
      }),
    );
    await expect(store.load()).rejects.toThrow(
      new CorruptStateError(KEY, 'timer 1 ends before it starts'),
    );
  });

  test('an invalid timestamp string is a CorruptStateError', async () => {
    const { store, storage } = makeStore();
    storage.files.set(KEY, JSON.stringify({ version: 1, timers: [{ start: 'yesterday morning', end: null }] }));
    await expect(store.load()).rejects.toBeInstanceOf(CorruptStateError);
    await expect(store.load()).rejects.toThrow(/Invalid datetime at timers\.0\.start/);
  });

  test('unknown versions are rejected', async () => {
    const { store, storage } = makeStore();
    storage.files.set(KEY, JSON.stringify({ version: 2, timers: [] }));
    await expect(store.load()).rejects.toBeInstanceOf(CorruptStateError);
  });

  test('two running records are a CorruptStateError', async () => {
    const { store, storage } = makeStore();
    storage.files.set(
      KEY,
      JSON.stringify({
        version: 1,
        timers: [
          { start: '2026-10-19T08:00:00.000Z', end: null },
          { start: '2026-10-19T09:00:00.000Z', end: null },
        ],
      }),
    );
    await expect(store.load()).rejects.toThrow(/timer 1 is still running but is not the latest timer/);
  });

  test('read failures surface as CorruptStateError with the cause attached', async () => {
    const storage = new MemoryStorage();
    const failure = new Error('EACCES: permission denied');
    jest.spyOn(storage, 'read').mockRejectedValue(failure);
    const store = new TimerStore(storage, KEY);

    const err = await store.load().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CorruptStateError);
    expect(err).toHaveProperty('cause', failure);
    expect(err).toHaveProperty('message', expect.stringContaining('EACCES'));
  });

  test('save refuses an inconsistent history', async () => {
    const { store, storage } = makeStore();
    await expect(store.save([{ start: 2000, end: 1000 }])).rejects.toThrow(/ends before it starts/);
    expect(storage.files.size).toBe(0);
  });

  test('findInconsistency accepts a closed history and a trailing running record', () => {
    expect(findInconsistency([])).toBeNull();
    expect(findInconsistency([{ start: 1, end: 2 }, { start: 3, end: null }])).toBeNull();
    expect(findInconsistency([{ start: 1, end: 1 }])).toBeNull();
  });
});
