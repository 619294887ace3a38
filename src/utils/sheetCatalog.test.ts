import { describe, expect, it } from 'vitest';
import { resolveSheets } from './sheetCatalog';

describe('resolveSheets', () => {
    it('lists common sheets in base order', () => {
        const catalog = resolveSheets(['S3', 'S1', 'S2'], ['S2', 'S4', 'S3']);
        expect(catalog.common).toEqual(['S3', 'S2']);
        expect(catalog.baseOnly).toEqual(['S1']);
        expect(catalog.incomingOnly).toEqual(['S4']);
        expect(catalog.hasCommon).toBe(true);
    });

    it('signals when nothing matches', () => {
        const catalog = resolveSheets(['Data'], ['Sheet1']);
        expect(catalog.common).toEqual([]);
        expect(catalog.baseOnly).toEqual(['Data']);
        expect(catalog.incomingOnly).toEqual(['Sheet1']);
        expect(catalog.hasCommon).toBe(false);
    });

    it('matches names exactly', () => {
        const catalog = resolveSheets(['sheet1'], ['Sheet1']);
        expect(catalog.hasCommon).toBe(false);
    });
});
