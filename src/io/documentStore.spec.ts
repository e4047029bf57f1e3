import test from 'node:test';
import assert from 'node:assert/strict';

import { Collection, SqliteDocumentStore } from './documentStore.js';
import { PersistenceFailure } from '../errors.js';

test('inserts append per collection with ids and timestamps', () => {
    let clock = 1_000;
    const store = new SqliteDocumentStore(':memory:', () => clock++);
    try {
        const a = store.insert(Collection.BestPathsSelected, { name: 'SOL-BONK', value: [] });
        const b = store.insert(Collection.UltraStrategies, { name: '0-SOL-BONK-1-SOL-WIF', value: [] });
        const c = store.insert(Collection.BestPathsSelected, { name: 'SOL-WIF', value: [] });
        assert.deepEqual([a, b, c], [1, 2, 3]);

        assert.equal(store.count(Collection.BestPathsSelected), 2);
        assert.equal(store.count(Collection.UltraStrategies), 1);
        assert.equal(store.count('other'), 0);

        const docs = store.find(Collection.BestPathsSelected);
        assert.deepEqual(
            docs.map(d => [d.id, d.insertedAt, d.body]),
            [
                [1, 1_000, { name: 'SOL-BONK', value: [] }],
                [3, 1_002, { name: 'SOL-WIF', value: [] }],
            ]
        );
    } finally {
        store.close();
    }
});

test('bigints are stored as decimal strings', () => {
    const store = new SqliteDocumentStore(':memory:');
    try {
        store.insert('c', { profit: 123_456_789_012_345_678_901n });
        assert.deepEqual(store.find('c')[0]?.body, { profit: '123456789012345678901' });
    } finally {
        store.close();
    }
});

test('writes after close surface as PersistenceFailure', () => {
    const store = new SqliteDocumentStore(':memory:');
    store.close();
    assert.throws(() => store.insert('c', {}), PersistenceFailure);
});
