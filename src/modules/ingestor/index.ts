import fs from 'fs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { BatchRow } from '../exporter';
import { Validators } from '../../utils/validators';
import { ValidationError } from '../../utils/errors';

const InputRowSchema = z.object({
    person_name: z.string().optional(),
    company_name: z.string().optional(),
}).passthrough();

const DELIMITER_SAMPLE_BYTES = 64 * 1024;

function detectDelimiter(filePath: string): string {
    let fd: number | null = null;
    try {
        fd = fs.openSync(filePath, 'r');
        const buffer = Buffer.alloc(DELIMITER_SAMPLE_BYTES);
        const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
        if (bytesRead <= 0) return ',';

        const firstLine = buffer.toString('utf8', 0, bytesRead).split(/\r?\n/)[0] || '';
        const commas = (firstLine.match(/,/g) || []).length;
        const semicolons = (firstLine.match(/;/g) || []).length;
        const tabs = (firstLine.match(/\t/g) || []).length;

        if (semicolons > commas && semicolons >= tabs) return ';';
        if (tabs > commas && tabs > semicolons) return '\t';
        return ',';
    } finally {
        if (fd !== null) fs.closeSync(fd);
    }
}

export function mapHeaders(headers: string[]): string[] {
    return headers.map((h) => {
        const slug = h.toLowerCase().trim().replace(/[^a-z0-9]/g, '_');

        if (slug.includes('company') || slug.includes('employer') || slug.includes('organization')) return 'company_name';
        if (slug.includes('person') || slug.includes('name') || slug.includes('contact')) return 'person_name';
        return slug;
    });
}

/**
 * Streams `person_name,company_name` rows. Rows that fail validation are
 * still yielded, with `error` set and no query.
 */
export async function* ingestCSV(filePath: string): AsyncGenerator<BatchRow, void, unknown> {
    const parser = fs.createReadStream(filePath).pipe(parse({
        columns: (header: string[]) => mapHeaders(header),
        delimiter: detectDelimiter(filePath),
        trim: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
    }));

    let lineCount = 0;
    for await (const record of parser) {
        lineCount++;
        const parsed = InputRowSchema.safeParse(record);
        const person = parsed.success ? parsed.data.person_name ?? '' : '';
        const company = parsed.success ? parsed.data.company_name ?? '' : '';

        try {
            const query = Validators.toQuery(person, company);
            yield { line_number: lineCount, person_name: person, company_name: company, query };
        } catch (e) {
            if (!(e instanceof ValidationError)) throw e;
            yield { line_number: lineCount, person_name: person, company_name: company, error: e.message };
        }
    }
}
