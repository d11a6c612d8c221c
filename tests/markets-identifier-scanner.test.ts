import { DEFAULT_TOKEN_PATTERN } from '../src/markets/config.js';
import { decodeTokenText, listCategories, scanIdentifiers } from '../src/markets/identifier-scanner.js';
import type { TokenPattern } from '../src/markets/types.js';
import { BufferBuilder, categoryToken, threeMarketBuffer } from './helpers/test-utils.js';

describe('Identifier Scanner', () => {
    it('finds every category token in byte order', () => {
        const { tokens, discarded } = scanIdentifiers(threeMarketBuffer(), DEFAULT_TOKEN_PATTERN);

        expect(discarded).toBe(0);
        expect(tokens.map((t) => [t.numericId, t.offset, t.length])).toEqual([
            ['123', 0, 32],
            ['4567', 44, 32],
            ['89', 92, 28],
        ]);
        expect(tokens[0]).toEqual({
            rawToken: 'Z2lkOi8vaHMzL0NhdGVnb3J5LzEyMw==',
            categoryId: 'gid://hs3/Category/123',
            numericId: '123',
            offset: 0,
            length: 32,
        });
    });

    it('returns nothing for a buffer without tokens', () => {
        const buffer = new BufferBuilder().floats(1.5, 2.5).ascii('no markets here').build();
        expect(scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN)).toEqual({ tokens: [], discarded: 0 });
    });

    it('discards a token whose suffix is not numeric', () => {
        const buffer = new BufferBuilder().token('?ref').raw(0).token(77).build();
        const { tokens, discarded } = scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN);

        expect(categoryToken('?ref')).toBe('Z2lkOi8vaHMzL0NhdGVnb3J5Lz9yZWY=');
        expect(discarded).toBe(1);
        expect(tokens.map((t) => t.numericId)).toEqual(['77']);
    });

    it('does not match other entity types or malformed category paths', () => {
        const buffer = new BufferBuilder()
            .ascii(Buffer.from('gid://hs3/Player/123').toString('base64'))
            .raw(0)
            .token('abc')
            .raw(0)
            .ascii('gid://hs3/Category/123')
            .build();
        expect(scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN)).toEqual({ tokens: [], discarded: 0 });
    });

    it('keeps duplicate tokens', () => {
        const buffer = new BufferBuilder().token(123).align().float32(2.5).token(123).align().build();
        const { tokens } = scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN);
        expect(tokens.map((t) => [t.numericId, t.offset])).toEqual([['123', 0], ['123', 36]]);
    });

    it('stops a padded token at its padding', () => {
        const buffer = new BufferBuilder().token(123).ascii('AAAA').build();

        const { tokens } = scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN);
        expect(tokens).toHaveLength(1);
        expect(tokens[0].rawToken).toBe(categoryToken(123));
        expect(tokens[0].length).toBe(32);
    });

    it('reads the id from an unpadded token that ran into adjacent base64 bytes', () => {
        const buffer = new BufferBuilder().token(89).ascii('QUJD').build();

        const { tokens } = scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN);
        expect(tokens[0].categoryId).toBe('gid://hs3/Category/89ABC');
        expect(tokens[0].numericId).toBe('89');
        expect(tokens[0].length).toBe(32);
    });

    it('splits back-to-back padded tokens', () => {
        const buffer = new BufferBuilder().token(123).token(4567).build();

        const { tokens } = scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN);
        expect(tokens.map((t) => [t.rawToken, t.numericId, t.offset, t.length])).toEqual([
            [categoryToken(123), '123', 0, 32],
            [categoryToken(4567), '4567', 32, 32],
        ]);
    });

    it('splits back-to-back unpadded tokens at the next prefix', () => {
        const buffer = new BufferBuilder().token(12).token(34).build();

        expect(categoryToken(12)).not.toContain('=');
        const { tokens } = scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN);
        expect(tokens.map((t) => [t.categoryId, t.numericId, t.offset, t.length])).toEqual([
            ['gid://hs3/Category/12', '12', 0, 28],
            ['gid://hs3/Category/34', '34', 28, 28],
        ]);
    });

    it('supports a plain-text token pattern', () => {
        const pattern: TokenPattern = { encoded: /C\d+/g, encoding: 'utf8', numericSuffix: /^C(\d+)$/ };
        const buffer = new BufferBuilder().ascii('C123').floats(2.5, 1.5).ascii('C9').build();

        const { tokens } = scanIdentifiers(buffer, pattern);
        expect(tokens).toEqual([
            { rawToken: 'C123', categoryId: 'C123', numericId: '123', offset: 0, length: 4 },
            { rawToken: 'C9', categoryId: 'C9', numericId: '9', offset: 12, length: 2 },
        ]);
    });

    it('accepts a pattern without the global flag', () => {
        const pattern: TokenPattern = { encoded: /C\d+/, encoding: 'utf8', numericSuffix: /^C(\d+)$/ };
        const buffer = new BufferBuilder().ascii('C1 C2 C3').build();
        expect(scanIdentifiers(buffer, pattern).tokens.map((t) => t.numericId)).toEqual(['1', '2', '3']);
    });

    it('decodeTokenText cuts at padding and drops a lone trailing sextet', () => {
        expect(decodeTokenText('Z2lkOi8vaHMzL0NhdGVnb3J5LzEyMw==QUJD', 'base64')).toBe('gid://hs3/Category/123');
        expect(decodeTokenText('Zm9vY', 'base64')).toBe('foo');
        expect(decodeTokenText('C42', 'utf8')).toBe('C42');
    });

    describe('listCategories', () => {
        it('returns unique categories sorted by raw token', () => {
            const buffer = new BufferBuilder()
                .token(89).raw(0).align().token(4567).raw(0).align()
                .token(123).raw(0).align().token(89).raw(0).align()
                .build();
            const { tokens } = scanIdentifiers(buffer, DEFAULT_TOKEN_PATTERN);

            expect(tokens).toHaveLength(4);
            expect(listCategories(tokens)).toEqual([
                { rawToken: categoryToken(123), categoryId: 'gid://hs3/Category/123', numericId: '123' },
                { rawToken: categoryToken(4567), categoryId: 'gid://hs3/Category/4567', numericId: '4567' },
                { rawToken: categoryToken(89), categoryId: 'gid://hs3/Category/89', numericId: '89' },
            ]);
        });
    });
});
