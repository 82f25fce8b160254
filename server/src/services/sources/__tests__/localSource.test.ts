import { fileURLToPath } from 'node:url';
import type { LocalSourceConfig } from '../../../config/engine.js';
import { DEFAULT_SOURCE_FILES } from '../../../config/sources.js';
import { UpstreamUnavailableError } from '../../../utils/errors.js';
import { LocalSourceAdapter } from '../localSource.js';

const fixtures = fileURLToPath(new URL('./fixtures/', import.meta.url));

function adapter(files: Partial<LocalSourceConfig['files']> = {}): LocalSourceAdapter {
    return new LocalSourceAdapter({
        mode: 'local',
        directory: fixtures,
        files: { ...DEFAULT_SOURCE_FILES, ...files },
    });
}

describe('LocalSourceAdapter', () => {
    it('reads all three export files', async () => {
        const raw = await adapter().fetchAll();

        expect(raw.leadTimes).toEqual({
            columns: ['Teil', 'WBZ'],
            rows: [{ Teil: 'P1', WBZ: '5' }, { Teil: 'P2', WBZ: '2' }],
        });
        expect(raw.transactions.rows).toHaveLength(4);
        expect(raw.transactions.rows[0]).toEqual({
            Teil: 'P1',
            Termin: '18.03.2025',
            Bedarfsmenge: '3',
            Deckungsmenge: '0',
            KommNr: 'K-100',
            SubRefObj: '',
            Buchungsinfo: 'Kundenauftrag',
        });
    });

    it('repairs the single-column stock export', async () => {
        const raw = await adapter().fetchAll();
        expect(raw.stock).toEqual({
            columns: ['Teil', 'Anzahl'],
            rows: [{ Teil: 'P1', Anzahl: 10 }, { Teil: 'P2', Anzahl: 0 }],
        });
    });

    it('fails the whole fetch when a file is missing', async () => {
        const error = await adapter({ stock: 'missing.csv' }).fetchAll().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(UpstreamUnavailableError);
        expect(error).toMatchObject({ source: 'stock', statusCode: 502 });
    });

    it('describes the resolved file paths', () => {
        expect(adapter().describe().leadTimes).toBe(fileURLToPath(new URL('./fixtures/wbz.csv', import.meta.url)));
    });
});
