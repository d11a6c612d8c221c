import { Markets64 } from '../src/index.js';
import { MarketPayloadDecoder } from '../src/markets/decode.js';
import { DecoderConfigError, PayloadDecodeError } from '../src/markets/errors.js';
import { PayloadCodecId } from '../src/markets/payload-codecs.js';
import { BufferBuilder, categoryToken, collectingLogger, encodePayload, threeMarketBuffer } from './helpers/test-utils.js';

const THREE_MARKET_RECORDS = [
    {
        numericId: '123',
        categoryId: 'gid://hs3/Category/123',
        rawToken: categoryToken(123),
        offset: 0,
        finalLine: 25.5,
        topOverValue: 1.91,
        topUnderValue: 1.87,
    },
    {
        numericId: '4567',
        categoryId: 'gid://hs3/Category/4567',
        rawToken: categoryToken(4567),
        offset: 44,
        finalLine: 2.5,
        topOverValue: 1.95,
        topUnderValue: 3,
    },
    {
        numericId: '89',
        categoryId: 'gid://hs3/Category/89',
        rawToken: categoryToken(89),
        offset: 92,
        finalLine: null,
        topOverValue: null,
        topUnderValue: null,
    },
];

describe('MarketPayloadDecoder', () => {
    it('decodes a payload end to end', () => {
        const decoder = new MarketPayloadDecoder();
        const result = decoder.decode({ playerName: 'Test Player', markets64: encodePayload(threeMarketBuffer()) });

        expect(result.error).toBeNull();
        expect(result.codec).toBe(PayloadCodecId.ZLIB);
        expect(result.playerName).toBe('Test Player');
        expect(result.records).toEqual(THREE_MARKET_RECORDS);
        expect(result.diagnostics).toEqual({
            bufferBytes: 120,
            tokensMatched: 3,
            tokensDiscarded: 0,
            windowsScanned: 30,
            implausibleDiscarded: 24,
            candidatesKept: 6,
            recordsEmitted: 3,
            emptyRecordsDropped: 0,
        });
    });

    it('is idempotent', () => {
        const decoder = new MarketPayloadDecoder();
        const payload = { playerName: 'Test Player', markets64: encodePayload(threeMarketBuffer()) };

        const first = decoder.decode(payload);
        const second = decoder.decode(payload);
        const fresh = new MarketPayloadDecoder().decode(payload);

        expect(second.records).toEqual(first.records);
        expect(JSON.stringify(fresh.records)).toBe(JSON.stringify(first.records));
    });

    it('gives the same records for zlib and gzip containers', () => {
        const decoder = new MarketPayloadDecoder();
        const zlib = decoder.decode({ playerName: 'p', markets64: encodePayload(threeMarketBuffer(), PayloadCodecId.ZLIB) });
        const gzip = decoder.decode({ playerName: 'p', markets64: encodePayload(threeMarketBuffer(), PayloadCodecId.GZIP) });

        expect(gzip.codec).toBe(PayloadCodecId.GZIP);
        expect(gzip.records).toEqual(zlib.records);
    });

    it('keeps a negative spread as the line', () => {
        const buffer = new BufferBuilder().token(123).align().floats(-3.5, 1.91, 1.87).build();
        const { records } = new MarketPayloadDecoder().decodeBytes(buffer);
        expect(records[0]).toMatchObject({ finalLine: -3.5, topOverValue: 1.91, topUnderValue: 1.87 });
    });

    it('emits one record per back-to-back token', () => {
        const decoder = new MarketPayloadDecoder();

        const padded = decoder.decodeBytes(
            new BufferBuilder().token(123).token(4567).align().floats(2.5, 1.91, 1.87).build()
        );
        expect(padded.records.map((r) => [r.numericId, r.finalLine, r.topOverValue, r.topUnderValue])).toEqual([
            ['123', null, null, null],
            ['4567', 2.5, 1.91, 1.87],
        ]);

        const unpadded = decoder.decodeBytes(new BufferBuilder().token(12).token(34).align().build());
        expect(unpadded.records.map((r) => [r.numericId, r.categoryId])).toEqual([
            ['12', 'gid://hs3/Category/12'],
            ['34', 'gid://hs3/Category/34'],
        ]);
    });

    it('returns an empty result for a payload with no markets', () => {
        const markets64 = encodePayload(new BufferBuilder().floats(1.5, 2.5, 3.0).build());
        const result = new MarketPayloadDecoder().decode({ playerName: 'Idle', markets64 });

        expect(result.error).toBeNull();
        expect(result.records).toEqual([]);
        expect(result.diagnostics.candidatesKept).toBe(3);
        expect(result.diagnostics.tokensMatched).toBe(0);
    });

    it('turns an inflate failure into zero records and one warning', () => {
        const { logger, entries } = collectingLogger();
        const decoder = new MarketPayloadDecoder({}, logger);

        const result = decoder.decode({ playerName: 'Broken', markets64: Buffer.from('hello world').toString('base64') });

        expect(result.records).toEqual([]);
        expect(result.codec).toBeNull();
        expect(result.error).toBeInstanceOf(PayloadDecodeError);
        expect(result.error?.stage).toBe('inflate');
        expect(entries).toEqual([
            { level: 'warn', msg: '[decoder] inflate failed for "Broken": no zlib or gzip header' },
        ]);
    });

    it('logs the diagnostic summary at debug', () => {
        const { logger, entries } = collectingLogger();
        new MarketPayloadDecoder({}, logger).decode({ playerName: 'Test Player', markets64: encodePayload(threeMarketBuffer()) });

        expect(entries).toEqual([{
            level: 'debug',
            msg: '[decoder] Test Player: codec=zlib bytes=120 tokens=3 discardedTokens=0 windows=30 '
                + 'implausible=24 candidates=6 records=3 droppedEmpty=0',
        }]);
    });

    it('rejects an invalid config before decoding anything', () => {
        expect(() => new MarketPayloadDecoder({ byteStride: 0 })).toThrow(DecoderConfigError);
    });

    it('lists the categories of a payload', () => {
        const buffer = new BufferBuilder()
            .token(4567).raw(0).align().floats(2.5)
            .token(123).raw(0).align().floats(1.5)
            .token(4567).raw(0).align()
            .build();
        const decoder = new MarketPayloadDecoder();

        expect(decoder.extractCategories({ playerName: 'p', markets64: encodePayload(buffer) })).toEqual([
            { rawToken: categoryToken(123), categoryId: 'gid://hs3/Category/123', numericId: '123' },
            { rawToken: categoryToken(4567), categoryId: 'gid://hs3/Category/4567', numericId: '4567' },
        ]);
        expect(decoder.extractCategories({ playerName: 'p', markets64: '' })).toEqual([]);
    });

    describe('Markets64 namespace', () => {
        it('decodes through the facade', () => {
            const result = Markets64.decode({ playerName: 'Test Player', markets64: encodePayload(threeMarketBuffer()) });
            expect(result.records).toEqual(THREE_MARKET_RECORDS);
        });

        it('exposes config resolution', () => {
            expect(Markets64.configure({ lookaheadWindow: 16 }).lookaheadWindow).toBe(16);
            expect(new Markets64.Decoder().config.byteStride).toBe(4);
        });
    });
});
