import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { BatchRow, CSV_COLUMNS, Exporter, toDisplayRecord } from '../../src/modules/exporter';
import { ConfidenceLevel, ResolvedContact } from '../../src/types';

const contact: ResolvedContact = {
    phone: '(415) 555-0199',
    confidenceLevel: ConfidenceLevel.MEDIUM,
    source: 'Company Website (/contact)',
    validationScore: 0.7,
    socialProfiles: {
        linkedin: 'https://linkedin.com/in/jane-doe',
        twitter: 'https://twitter.com/janedoe',
    },
};

describe('toDisplayRecord', () => {
    it('flattens a resolved contact', () => {
        expect(toDisplayRecord(contact)).toEqual({
            phone: '(415) 555-0199',
            confidence_level: 'MEDIUM',
            source: 'Company Website (/contact)',
            validation_score: 0.7,
            linkedin: 'https://linkedin.com/in/jane-doe',
            twitter: 'https://twitter.com/janedoe',
        });
    });

    it('uses null for missing profiles', () => {
        const record = toDisplayRecord({ ...contact, socialProfiles: {} });
        expect(record.linkedin).toBeNull();
        expect(record.twitter).toBeNull();
    });
});

describe('Exporter.toCSV', () => {
    it('writes one line per row under a fixed header', () => {
        const rows: BatchRow[] = [
            { line_number: 1, person_name: 'Jane Doe', company_name: 'Acme Corp', contact },
            { line_number: 2, person_name: '', company_name: 'Acme Corp', error: 'Person name cannot be empty' },
        ];

        const lines = Exporter.toCSV(rows).trim().split('\n');
        expect(lines).toEqual([
            CSV_COLUMNS.join(','),
            '1,Jane Doe,Acme Corp,(415) 555-0199,MEDIUM,Company Website (/contact),0.7,https://linkedin.com/in/jane-doe,https://twitter.com/janedoe,',
            '2,,Acme Corp,,,,,,,Person name cannot be empty',
        ]);
    });
});

describe('Exporter.writeJSON', () => {
    it('writes the same flat records as the CSV output', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'contact-resolver-'));
        const file = path.join(dir, 'out.json');
        const rows: BatchRow[] = [
            { line_number: 1, person_name: 'Jane Doe', company_name: 'Acme Corp', contact },
            { line_number: 2, person_name: '', company_name: 'Acme Corp', error: 'Person name cannot be empty' },
        ];

        Exporter.writeJSON(rows, file);

        expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual([
            {
                line_number: 1,
                person_name: 'Jane Doe',
                company_name: 'Acme Corp',
                phone: '(415) 555-0199',
                confidence_level: 'MEDIUM',
                source: 'Company Website (/contact)',
                validation_score: 0.7,
                linkedin: 'https://linkedin.com/in/jane-doe',
                twitter: 'https://twitter.com/janedoe',
                error: '',
            },
            {
                line_number: 2,
                person_name: '',
                company_name: 'Acme Corp',
                phone: '',
                confidence_level: '',
                source: '',
                validation_score: '',
                linkedin: '',
                twitter: '',
                error: 'Person name cannot be empty',
            },
        ]);
        fs.rmSync(dir, { recursive: true, force: true });
    });
});
