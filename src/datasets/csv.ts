export class CsvParseError extends Error {
    constructor(message: string, public readonly line: number) {
        super(message);
        this.name = 'CsvParseError';
    }
}

/**
 * Parse CSV text (RFC 4180): comma-separated fields, CRLF or LF record
 * breaks, double-quoted fields that may hold commas, line breaks and
 * doubled quotes. A leading BOM and the final line break are ignored.
 *
 * @throws CsvParseError on an unterminated quoted field or text after a closing quote
 */
export function parseCsv(text: string): string[][] {
    const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    const records: string[][] = [];

    let record: string[] = [];
    let field = '';
    let inQuotes = false;
    let afterQuote = false;
    let line = 1;
    let quoteLine = 1;

    for (let i = 0; i < input.length; i++) {
        const ch = input[i];

        if (inQuotes) {
            if (ch === '"') {
                if (input[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                    afterQuote = true;
                }
            } else {
                if (ch === '\n') line++;
                field += ch;
            }
            continue;
        }

        if (ch === ',') {
            record.push(field);
            field = '';
            afterQuote = false;
            continue;
        }

        if (ch === '\r' || ch === '\n') {
            if (ch === '\r' && input[i + 1] === '\n') i++;
            record.push(field);
            records.push(record);
            record = [];
            field = '';
            afterQuote = false;
            line++;
            continue;
        }

        if (afterQuote) {
            throw new CsvParseError(`Unexpected character after closing quote on line ${line}`, line);
        }

        if (ch === '"' && field === '') {
            inQuotes = true;
            quoteLine = line;
            continue;
        }

        field += ch;
    }

    if (inQuotes) {
        throw new CsvParseError(`Unterminated quoted field starting on line ${quoteLine}`, quoteLine);
    }

    if (field !== '' || afterQuote || record.length > 0) {
        record.push(field);
        records.push(record);
    }

    return records;
}
