import { TransientStoreError } from '../src/errors/transient-store.error';
import { RedisLockStore } from '../src/locks';

describe('RedisLockStore', () => {
    let redis: { set: jest.Mock; eval: jest.Mock; get: jest.Mock };
    let store: RedisLockStore;

    beforeEach(() => {
        redis = { set: jest.fn(), eval: jest.fn(), get: jest.fn() };
        store = new RedisLockStore(redis);
    });

    it('uses SET PX NX with whole milliseconds', async () => {
        redis.set.mockResolvedValue('OK');

        await expect(store.setIfAbsent('lock:a', 'tok', 1500.2)).resolves.toBe(true);
        expect(redis.set).toHaveBeenCalledWith('lock:a', 'tok', 'PX', 1501, 'NX');
    });

    it('reports a held key when SET NX returns null', async () => {
        redis.set.mockResolvedValue(null);

        await expect(store.setIfAbsent('lock:a', 'tok', 1000)).resolves.toBe(false);
    });

    it('deletes through the compare-and-delete script', async () => {
        redis.eval.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

        await expect(store.compareAndDelete('lock:a', 'tok')).resolves.toBe(true);
        await expect(store.compareAndDelete('lock:a', 'tok')).resolves.toBe(false);

        expect(redis.eval).toHaveBeenCalledWith(
            expect.stringContaining('redis.call("del", KEYS[1])'),
            1,
            'lock:a',
            'tok',
        );
    });

    it('reads the current holder', async () => {
        redis.get.mockResolvedValue('tok');

        await expect(store.get('lock:a')).resolves.toBe('tok');
        expect(redis.get).toHaveBeenCalledWith('lock:a');
    });

    it('wraps connection failures as TransientStoreError', async () => {
        redis.set.mockRejectedValue(
            Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:6379'), { code: 'ECONNREFUSED' }),
        );

        const err = await store.setIfAbsent('lock:a', 'tok', 1000).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(TransientStoreError);
        expect(err).toMatchObject({ store: 'redis', name: 'TransientStoreError' });
    });

    it('passes other errors through unchanged', async () => {
        const wrongType = new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
        redis.eval.mockRejectedValue(wrongType);

        await expect(store.compareAndDelete('lock:a', 'tok')).rejects.toBe(wrongType);
    });
});
