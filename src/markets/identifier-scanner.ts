/**
 * Identifier Scanner.
 *
 * Category references are embedded in the buffer as base64 text of
 * `gid://<ns>/Category/<n>`. The scan runs a regex over a latin1 view of the
 * buffer, where one char is one byte, so match indices are byte offsets.
 */
import type { IdentifierToken, TokenEncoding, TokenPattern } from './types.js';

export interface ScanResult {
    tokens: IdentifierToken[];
    /** Matches whose decoded text had no numeric suffix. */
    discarded: number;
}

export interface CategoryEntry {
    rawToken: string;
    categoryId: string;
    numericId: string;
}

const DIGITS = /^\d+$/;

export function latin1View(buffer: Uint8Array): string {
    return Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength).toString('latin1');
}

/**
 * Token text is cut at the first `=`; a lone trailing sextet carries no full byte
 * and is dropped.
 */
export function decodeTokenText(raw: string, encoding: TokenEncoding): string {
    if (encoding === 'utf8') {
        return Buffer.from(raw, 'latin1').toString('utf8');
    }
    let body = raw.split('=', 1)[0];
    if (body.length % 4 === 1) body = body.slice(0, -1);
    return Buffer.from(body, 'base64').toString('utf8');
}

function globalPattern(re: RegExp): RegExp {
    return re.global ? re : new RegExp(re.source, re.flags + 'g');
}

export function scanIdentifiers(buffer: Uint8Array, pattern: TokenPattern): ScanResult {
    const view = latin1View(buffer);
    const tokens: IdentifierToken[] = [];
    let discarded = 0;

    for (const match of view.matchAll(globalPattern(pattern.encoded))) {
        const rawToken = match[0];
        if (rawToken.length === 0 || match.index === undefined) continue;

        const categoryId = decodeTokenText(rawToken, pattern.encoding);
        const numericId = pattern.numericSuffix.exec(categoryId)?.[1];
        if (numericId === undefined || !DIGITS.test(numericId)) {
            discarded++;
            continue;
        }

        tokens.push({
            rawToken,
            categoryId,
            numericId,
            offset: match.index,
            length: rawToken.length,
        });
    }

    return { tokens, discarded };
}

/**
 * Unique categories referenced by a payload, sorted by raw token.
 */
export function listCategories(tokens: readonly IdentifierToken[]): CategoryEntry[] {
    const unique = new Map<string, CategoryEntry>();
    for (const t of tokens) {
        if (!unique.has(t.rawToken)) {
            unique.set(t.rawToken, { rawToken: t.rawToken, categoryId: t.categoryId, numericId: t.numericId });
        }
    }
    return Array.from(unique.values()).sort((a, b) => (a.rawToken < b.rawToken ? -1 : a.rawToken > b.rawToken ? 1 : 0));
}
