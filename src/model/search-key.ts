import { isValid, parse } from 'date-fns';

/**
 * Search keys are the normalized cell labels sent to candidate generators.
 * Cells whose labels normalize to the same key share one generator lookup.
 */
export type SearchKey = string;

export interface SearchKeyOptions {
    /** Apply `simplifyLabel` before normalizing */
    simplify?: boolean;
}

/**
 * Remove a bracketed part, e.g. a pronunciation or birth date,
 * when it opens within the first five tokens of the label.
 *
 * "Barack Obama (born 1961)" → "Barack Obama "
 */
export function removeBrackets(label: string): string {
    const open = label.indexOf('(');
    if (open < 0) return label;

    const close = label.indexOf(')', open);
    if (close < 0) return label;

    const headLength = label.split(/\s+/).filter(Boolean).slice(0, 5).join(' ').length;
    if (open >= headLength) return label;

    return label.slice(0, open) + label.slice(close + 1);
}

/** Token shapes read as (part of) a date */
const DATE_FORMATS = [
    'yyyy-MM-dd',
    'yyyy/MM/dd',
    'yyyy-MM',
    'dd/MM/yyyy',
    'MM/dd/yyyy',
    'd.M.yyyy',
    'yyyy',
    'd',
    'do',
    'MMMM',
    'MMM',
    'EEEE',
    'EEE',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

function isDateToken(token: string): boolean {
    return DATE_FORMATS.some((format) => isValid(parse(token, format, REFERENCE_DATE)));
}

/**
 * Drop tokens that read as dates or date parts (days, month and weekday
 * names, years, numeric dates), also after stripping punctuation.
 * Letters glued to digits are split first.
 *
 * "2011-11-29November" → "", "Del Piero 9 November 1974" → "Del Piero"
 */
export function removeDates(label: string): string {
    return label
        .replace(/(\p{L}+)(\p{N}+)/gu, '$1 $2')
        .replace(/(\p{N}+)(\p{L}+)/gu, '$1 $2 ')
        .split(/\s+/)
        .filter((token) => token && !isDateToken(token) && !isDateToken(token.replace(/[\p{P}\p{S}]/gu, '')))
        .join(' ');
}

export function removeNumbers(label: string): string {
    return label
        .split(/\s+/)
        .filter((token) => token && !/^\p{N}+$/u.test(token))
        .join(' ');
}

export function removeSingleChars(label: string): string {
    return label
        .split(/\s+/)
        .filter((token) => [...token].length > 1)
        .join(' ');
}

/**
 * Strip label noise that hurts lookups: leading bracketed asides, dates,
 * bare numbers and single-character tokens.
 */
export function simplifyLabel(label: string): string {
    return removeSingleChars(removeNumbers(removeDates(removeBrackets(label))));
}

/**
 * Normalize a cell label into a search key.
 * - Unicode NFKC
 * - Optional simplification
 * - Collapse whitespace and trim
 * - Lowercase
 */
export function normalizeSearchKey(label: string, options: SearchKeyOptions = {}): SearchKey {
    let text = label.normalize('NFKC');
    if (options.simplify) {
        text = simplifyLabel(text);
    }
    return text.replace(/\s+/g, ' ').trim().toLowerCase();
}
