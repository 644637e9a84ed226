import { ValidationError } from '../errors/index.js';

/**
 * Zero-based, inclusive page interval
 */
export interface PageRange {
    first: number;
    last: number;
}

/**
 * Turn a 1-based, possibly open-ended page range into zero-based indices
 *
 * A bound of 0 means the same as an absent one. Bounds past either end of
 * the document are clamped; only an empty interval after clamping is rejected.
 *
 * @example
 * ```typescript
 * resolvePageRange(2, undefined, 5); // { first: 1, last: 4 }
 * resolvePageRange(1, 99, 5);        // { first: 0, last: 4 }
 * resolvePageRange(undefined, 0, 5); // { first: 0, last: 4 }
 * ```
 */
export function resolvePageRange(
    start: number | undefined,
    end: number | undefined,
    pageCount: number
): PageRange {
    // 0 counts as an absent bound
    const first = !start ? 0 : Math.max(0, start - 1);
    const last = !end ? pageCount - 1 : Math.min(pageCount - 1, end - 1);

    if (first > last) {
        throw new ValidationError(
            `Invalid range: start=${start ?? 'none'}, end=${end ?? 'none'} for ${pageCount} pages.`,
            'pageRange',
            { start, end, pageCount }
        );
    }

    return { first, last };
}

/**
 * Number of pages in a resolved range
 */
export function pageRangeSize(range: PageRange): number {
    return range.last - range.first + 1;
}

/**
 * Human-readable description, e.g. "page 3" or "pages 1-5" (1-based)
 */
export function describePageRange(range: PageRange): string {
    if (range.first === range.last) {
        return `page ${range.first + 1}`;
    }
    return `pages ${range.first + 1}-${range.last + 1}`;
}
