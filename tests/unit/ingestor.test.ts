import path from 'path';
import { describe, expect, it } from 'vitest';
import { BatchRow } from '../../src/modules/exporter';
import { ingestCSV, mapHeaders } from '../../src/modules/ingestor';

const fixture = (name: string) => path.resolve(__dirname, '../fixtures', name);

async function collect(filePath: string): Promise<BatchRow[]> {
    const rows: BatchRow[] = [];
    for await (const row of ingestCSV(filePath)) rows.push(row);
    return rows;
}

describe('mapHeaders', () => {
    it('maps common header spellings', () => {
        expect(mapHeaders(['Full Name', 'Employer', 'Organization', 'Notes']))
            .toEqual(['person_name', 'company_name', 'company_name', 'notes']);
    });
});

describe('ingestCSV', () => {
    it('yields valid rows with a query and invalid rows with an error', async () => {
        const rows = await collect(fixture('contacts.csv'));
        expect(rows).toEqual([
            {
                line_number: 1,
                person_name: 'Jane Doe',
                company_name: 'Acme Corp',
                query: { personName: 'Jane Doe', companyName: 'Acme Corp' },
            },
            { line_number: 2, person_name: '', company_name: 'Acme Corp', error: 'Person name cannot be empty' },
            { line_number: 3, person_name: 'J0hn', company_name: 'Beta Labs', error: 'Invalid name format' },
        ]);
    });

    it('detects semicolons and strips a byte-order mark', async () => {
        const rows = await collect(fixture('contacts_semicolon.csv'));
        expect(rows).toHaveLength(1);
        expect(rows[0].query).toEqual({ personName: 'John Roe', companyName: 'Beta Labs' });
    });
});
