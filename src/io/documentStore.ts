/**
 * Document store for selections
 *
 * Append-only JSON documents grouped by collection, kept in a single
 * better-sqlite3 table. Bigints are written as decimal strings.
 */

import Database from 'better-sqlite3';

import { PersistenceFailure } from '../errors.js';
import { encodeJson } from './strategyFile.js';

export const Collection = {
    BestPathsSelected: 'best_paths_selected',
    UltraStrategies: 'ultra_strategies',
} as const;

export interface DocumentStore {
    /** Returns the row id of the new document */
    insert(collection: string, document: object): number;
    close(): void;
}

export interface StoredDocument {
    id: number;
    collection: string;
    insertedAt: number;
    body: unknown;
}

interface DocumentRow {
    id: number;
    collection: string;
    inserted_at: number;
    body: string;
}

function openDatabase(file: string): Database.Database {
    try {
        const db = new Database(file);
        if (file !== ':memory:') {
            db.pragma('journal_mode = WAL');
            db.pragma('busy_timeout = 5000');
        }
        db.exec(`CREATE TABLE IF NOT EXISTS documents (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            collection TEXT NOT NULL,
            inserted_at INTEGER NOT NULL,
            body TEXT NOT NULL
        )`);
        db.exec(`CREATE INDEX IF NOT EXISTS idx_documents_collection ON documents(collection)`);
        return db;
    } catch (e) {
        throw new PersistenceFailure('could not open document store', file, e);
    }
}

export class SqliteDocumentStore implements DocumentStore {
    private readonly db: Database.Database;

    /** ':memory:' keeps everything in process */
    constructor(
        private readonly file: string,
        private readonly now: () => number = Date.now
    ) {
        this.db = openDatabase(file);
    }

    insert(collection: string, document: object): number {
        try {
            const info = this.db
                .prepare(`INSERT INTO documents (collection, inserted_at, body) VALUES (?, ?, ?)`)
                .run(collection, this.now(), encodeJson(document));
            return Number(info.lastInsertRowid);
        } catch (e) {
            throw new PersistenceFailure(`insert into ${collection} failed`, this.file, e);
        }
    }

    /** Documents of one collection in insertion order */
    find(collection: string): StoredDocument[] {
        const rows = this.db
            .prepare<[string], DocumentRow>(
                `SELECT id, collection, inserted_at, body FROM documents WHERE collection = ? ORDER BY id`
            )
            .all(collection);
        return rows.map(r => ({ id: r.id, collection: r.collection, insertedAt: r.inserted_at, body: JSON.parse(r.body) }));
    }

    count(collection: string): number {
        const row = this.db
            .prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM documents WHERE collection = ?`)
            .get(collection);
        return row?.n ?? 0;
    }

    close(): void {
        this.db.close();
    }
}
