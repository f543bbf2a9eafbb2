import { KeyValueStore, log } from 'crawlee';
import { errorMessage } from './errors.js';

/** Where bodies that could not be parsed go. Purely diagnostic: saving never throws. */
export interface DebugArtifactStore {
    save(name: string, body: string): Promise<void>;
}

/** Key-value store keys allow `a-zA-Z0-9!-_.'()` only. */
export function artifactKey(name: string, now: Date = new Date()): string {
    const stamp = now.toISOString().replace(/[:.]/g, '-');
    const base = name.replace(/^https?:\/\//, '').replace(/[^a-zA-Z0-9!\-_.'()]+/g, '_').slice(0, 200);
    return `${stamp}_${base}`.slice(0, 256);
}

export class KeyValueDebugStore implements DebugArtifactStore {
    private store?: Promise<KeyValueStore>;

    constructor(private readonly storeName = 'debug-pages') {}

    async save(name: string, body: string): Promise<void> {
        const key = artifactKey(name);
        try {
            this.store ??= KeyValueStore.open(this.storeName);
            const store = await this.store;
            await store.setValue(key, body, { contentType: 'text/html; charset=utf-8' });
            log.debug(`debug artifact saved: ${this.storeName}/${key}`);
        } catch (e) {
            log.warning('could not save debug artifact', { key, error: errorMessage(e) });
        }
    }
}

/** Keeps artifacts in memory; used when persistence is off and in tests. */
export class MemoryDebugStore implements DebugArtifactStore {
    readonly artifacts = new Map<string, string>();

    async save(name: string, body: string): Promise<void> {
        this.artifacts.set(name, body);
    }
}
