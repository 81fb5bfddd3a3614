import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createConfigService } from '../../../test/fakes/settings';
import { IndexFingerprint, IndexStoreService } from './index-store.service';
import { VectorIndex } from './vector-index';

const fingerprint: IndexFingerprint = {
    documentHash: 'doc-hash',
    chunkSize: 1000,
    chunkOverlap: 150,
    embeddingModel: 'fake-embedding',
};

function buildIndex(): VectorIndex {
    return new VectorIndex(
        [
            {
                chunk: {
                    id: 'chunk_0',
                    text: '## Experience\nJoined EXL in 2024.',
                    startIndex: 0,
                    endIndex: 33,
                    metadata: { chunkIndex: 0, totalChunks: 2, heading: 'Experience' },
                },
                embedding: [0.5, 0.25, 0],
            },
            {
                chunk: {
                    id: 'chunk_1',
                    text: 'Python',
                    startIndex: 35,
                    endIndex: 41,
                    metadata: { chunkIndex: 1, totalChunks: 2 },
                },
                embedding: [0, 1, 0],
            },
        ],
        { embeddingModel: 'fake-embedding', documentHash: 'doc-hash', builtAt: '2026-01-01T00:00:00.000Z' },
    );
}

describe('IndexStoreService', () => {
    let dir: string;
    let storePath: string;
    let store: IndexStoreService;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'index-store-'));
        storePath = path.join(dir, 'nested', 'index.json');
        store = new IndexStoreService(createConfigService({ indexStorePath: storePath }));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('round-trips an index with a matching fingerprint', async () => {
        const index = buildIndex();
        await store.save(index, fingerprint);

        const loaded = await store.load(fingerprint);

        expect(loaded).not.toBeNull();
        expect(loaded?.getEntries()).toEqual(index.getEntries());
        expect(loaded?.getStats()).toEqual(index.getStats());
        expect(fs.existsSync(`${storePath}.tmp`)).toBe(false);
    });

    it('ignores a stored index with a different fingerprint', async () => {
        await store.save(buildIndex(), fingerprint);

        await expect(store.load({ ...fingerprint, documentHash: 'changed' })).resolves.toBeNull();
        await expect(store.load({ ...fingerprint, chunkOverlap: 100 })).resolves.toBeNull();
        await expect(store.load({ ...fingerprint, embeddingModel: 'other-model' })).resolves.toBeNull();
    });

    it('returns null for a missing or malformed file', async () => {
        await expect(store.load(fingerprint)).resolves.toBeNull();

        fs.mkdirSync(path.dirname(storePath), { recursive: true });
        fs.writeFileSync(storePath, '{"version": 1, "entries": []}');
        await expect(store.load(fingerprint)).resolves.toBeNull();

        fs.writeFileSync(storePath, 'not json');
        await expect(store.load(fingerprint)).resolves.toBeNull();
    });

    it('does nothing when no store path is configured', async () => {
        const disabled = new IndexStoreService(createConfigService());

        expect(disabled.isEnabled()).toBe(false);
        await disabled.save(buildIndex(), fingerprint);
        await expect(disabled.load(fingerprint)).resolves.toBeNull();
        expect(store.isEnabled()).toBe(true);
    });
});
