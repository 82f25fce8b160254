import type { RawDatasets } from '@bestand/shared';
import { ValidationError, UpstreamUnavailableError } from '../../../utils/errors.js';
import { availabilityLogger } from '../../../utils/logger.js';
import { AvailabilityEngine } from '../engine.js';
import { FakeSource, TODAY, engineConfig, sampleDatasets } from './fakeSource.js';

function engineWith(source = new FakeSource(), policy?: Parameters<typeof engineConfig>[0]) {
    return { engine: new AvailabilityEngine(engineConfig(policy), source), source };
}

describe('AvailabilityEngine', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('calculateAll', () => {
        it('computes every part, stock order first', async () => {
            const { engine } = engineWith();
            const results = await engine.calculateAll();

            expect(results.map(r => [r.part, r.availableToday])).toEqual([
                ['P1', 9],
                ['P3', 4],
                ['P2', -1],
            ]);
            expect(results[0]).toEqual({
                part: 'P1',
                partKey: 'p1',
                stockOnHand: 10,
                cumulativeDemand: 3,
                cumulativeSupply: 2,
                availableToday: 9,
                leadTimeDays: 5,
                leadTimeEndDate: '2025-03-24',
                leadTimeEndTimestamp: Date.UTC(2025, 2, 24) / 1000,
                leadTimeSource: 'lead-time',
            });
            expect(results[2]).toMatchObject({ stockOnHand: 0, leadTimeDays: 2, leadTimeEndDate: '2025-03-19', cumulativeDemand: 1 });
        });

        it('fetches a fresh snapshot on every call', async () => {
            const { engine, source } = engineWith();
            await engine.calculateAll();
            await engine.calculateAll();
            expect(source.fetches).toBe(2);
        });

        it('propagates upstream failures', async () => {
            const { engine } = engineWith(new FakeSource(new UpstreamUnavailableError('stock feed down', 'stock')));
            await expect(engine.calculateAll()).rejects.toBeInstanceOf(UpstreamUnavailableError);
        });

        it('returns nothing under the strict policy when a feed is empty', async () => {
            const raw: RawDatasets = { ...sampleDatasets(), stock: { columns: ['Teil', 'Anzahl'], rows: [] } };
            const { engine } = engineWith(new FakeSource(raw), 'transfer-supply-strict');
            expect(await engine.calculateAll()).toEqual([]);
        });

        it('computes over partial feeds under the lenient policy', async () => {
            const raw: RawDatasets = { ...sampleDatasets(), stock: { columns: ['Teil', 'Anzahl'], rows: [] } };
            const { engine } = engineWith(new FakeSource(raw));
            const results = await engine.calculateAll();
            expect(results.map(r => [r.part, r.availableToday])).toEqual([['P1', -1], ['P2', -1]]);
        });

        it('warns when lead-time documents disagree', async () => {
            const warn = vi.spyOn(availabilityLogger, 'warn').mockImplementation(() => undefined);
            const raw = sampleDatasets();
            raw.transactions.rows.push(
                { Teil: 'P3', Termin: '20.03.2025', Buchungsinfo: 'WBZ-Beleg A' },
                { Teil: 'P3', Termin: '21.03.2025', Buchungsinfo: 'WBZ-Beleg B' },
            );
            const { engine } = engineWith(new FakeSource(raw));

            const results = await engine.calculateAll();

            expect(results.find(r => r.part === 'P3')).toMatchObject({ leadTimeEndDate: '2025-03-20', leadTimeSource: 'override' });
            expect(warn).toHaveBeenCalledWith(
                { part: 'P3', conflictingDates: ['2025-03-20', '2025-03-21'] },
                'Lead-time documents disagree on the window end',
            );
        });
    });

    describe('calculate', () => {
        it('matches requested parts by canonical key', async () => {
            const { engine } = engineWith();
            const results = await engine.calculate([' p1 ', '"P2"', 'unknown']);
            expect(results.map(r => [r.part, r.availableToday])).toEqual([['P1', 9], ['P2', -1]]);
        });

        it('returns an empty list when nothing matches', async () => {
            const { engine } = engineWith();
            expect(await engine.calculate(['X-404'])).toEqual([]);
        });

        it('rejects identifiers that clean to nothing', async () => {
            const { engine, source } = engineWith();
            await expect(engine.calculate(['""', '  '])).rejects.toBeInstanceOf(ValidationError);
            expect(source.fetches).toBe(0);
        });
    });

    describe('debug', () => {
        it('explains a known part', async () => {
            const { engine } = engineWith();
            const { result, diagnostics } = await engine.debug('p1');

            expect(result.availableToday).toBe(9);
            expect(diagnostics).toMatchObject({
                query: 'p1',
                part: 'P1',
                partKey: 'p1',
                today: TODAY,
                found: { leadTimes: 1, transactions: 3, stock: 1 },
                blockedByEmptySources: false,
                excluded: { 'outside-window': 1 },
                pairedCommissions: [],
            });
            expect(diagnostics.window.endDate).toBe('2025-03-24');
            expect(diagnostics.withinWindow.map(t => [t.outcome, t.countedDemand, t.countedSupply])).toEqual([
                ['counted', 3, 0],
                ['counted', 0, 2],
            ]);
            expect(diagnostics.rawRows.stock).toEqual([{ index: 0, row: { Teil: 'P1', Anzahl: 10 } }]);
            expect(diagnostics.rawRows.transactions.map(m => m.index)).toEqual([0, 1, 2]);
            expect(diagnostics.columns.leadTimes).toEqual(['Teil', 'WBZ']);
        });

        it('returns a zero-filled result for an unknown part', async () => {
            const { engine } = engineWith();
            const { result, diagnostics } = await engine.debug('nothing');

            expect(result).toMatchObject({
                part: 'nothing',
                stockOnHand: 0,
                cumulativeDemand: 0,
                cumulativeSupply: 0,
                availableToday: 0,
                leadTimeDays: 0,
                leadTimeEndDate: TODAY,
            });
            expect(diagnostics.found).toEqual({ leadTimes: 0, transactions: 0, stock: 0 });
            expect(diagnostics.rawRows).toEqual({ leadTimes: [], transactions: [], stock: [] });
        });

        it('rejects an empty identifier', async () => {
            const { engine } = engineWith();
            await expect(engine.debug('\u00A0')).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('healthCheck', () => {
        it('reports configuration without touching the feeds', async () => {
            const { engine, source } = engineWith();
            const health = await engine.healthCheck();

            expect(health).toMatchObject({
                status: 'ok',
                sourceMode: 'remote',
                policy: 'transfer-supply',
                today: TODAY,
                sources: { leadTimes: 'fake://wbz', transactions: 'fake://dispo', stock: 'fake://stockgrouped' },
            });
            expect(health.rowCounts).toBeUndefined();
            expect(source.fetches).toBe(0);
        });

        it('counts raw rows on a deep check', async () => {
            const { engine } = engineWith();
            const health = await engine.healthCheck({ deep: true });
            expect(health.status).toBe('ok');
            expect(health.rowCounts).toEqual({ leadTimes: 2, transactions: 4, stock: 2 });
        });

        it('reports an unreachable feed', async () => {
            const { engine } = engineWith(new FakeSource(new UpstreamUnavailableError('stock feed down', 'stock')));
            const health = await engine.healthCheck({ deep: true });
            expect(health).toMatchObject({ status: 'unavailable', error: 'stock feed down' });
        });
    });
});
