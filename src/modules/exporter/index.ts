import fs from 'fs';
import { stringify } from 'csv-stringify/sync';
import { ContactQuery, ResolvedContact } from '../../types';

export type DisplayRecord = {
    phone: string | null;
    confidence_level: string;
    source: string | null;
    validation_score: number | null;
    linkedin: string | null;
    twitter: string | null;
};

export type BatchRow = {
    line_number: number;
    query?: ContactQuery;
    person_name: string;
    company_name: string;
    contact?: ResolvedContact;
    error?: string;
};

export const CSV_COLUMNS = [
    'line_number',
    'person_name',
    'company_name',
    'phone',
    'confidence_level',
    'source',
    'validation_score',
    'linkedin',
    'twitter',
    'error',
] as const;

export function toDisplayRecord(contact: ResolvedContact): DisplayRecord {
    return {
        phone: contact.phone,
        confidence_level: contact.confidenceLevel,
        source: contact.source,
        validation_score: contact.validationScore,
        linkedin: contact.socialProfiles.linkedin ?? null,
        twitter: contact.socialProfiles.twitter ?? null,
    };
}

export class Exporter {

    static toRecords(rows: BatchRow[]): Record<(typeof CSV_COLUMNS)[number], string | number>[] {
        return rows.map((row) => {
            const display = row.contact ? toDisplayRecord(row.contact) : null;
            return {
                line_number: row.line_number,
                person_name: row.person_name,
                company_name: row.company_name,
                phone: display?.phone ?? '',
                confidence_level: display?.confidence_level ?? '',
                source: display?.source ?? '',
                validation_score: display?.validation_score ?? '',
                linkedin: display?.linkedin ?? '',
                twitter: display?.twitter ?? '',
                error: row.error ?? '',
            };
        });
    }

    static toCSV(rows: BatchRow[]): string {
        return stringify(this.toRecords(rows), { header: true, columns: [...CSV_COLUMNS] });
    }

    static writeCSV(rows: BatchRow[], filePath: string): void {
        fs.writeFileSync(filePath, this.toCSV(rows));
    }

    static writeJSON(rows: BatchRow[], filePath: string): void {
        fs.writeFileSync(filePath, JSON.stringify(this.toRecords(rows), null, 2));
    }
}
