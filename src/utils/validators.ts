import { ContactQuery } from '../types';
import { ValidationError } from './errors';

export interface FieldValidation {
    valid: boolean;
    error: string;
}

const PERSON_NAME_PATTERN = /^[A-Za-z\s'-]+$/;

export class Validators {

    static validatePersonName(name: string | undefined): FieldValidation {
        if (!name || !name.trim()) return { valid: false, error: 'Person name cannot be empty' };
        if (name.trim().length < 2) return { valid: false, error: 'Name too short' };
        if (!PERSON_NAME_PATTERN.test(name.trim())) return { valid: false, error: 'Invalid name format' };
        return { valid: true, error: '' };
    }

    static validateCompanyName(name: string | undefined): FieldValidation {
        if (!name || !name.trim()) return { valid: false, error: 'Company name cannot be empty' };
        if (name.trim().length < 2) return { valid: false, error: 'Company name too short' };
        return { valid: true, error: '' };
    }

    /**
     * Builds a query from user input, throwing ValidationError on the first bad field.
     */
    static toQuery(personName: string | undefined, companyName: string | undefined): ContactQuery {
        const person = this.validatePersonName(personName);
        if (!person.valid) throw new ValidationError(person.error, { field: 'personName' });

        const company = this.validateCompanyName(companyName);
        if (!company.valid) throw new ValidationError(company.error, { field: 'companyName' });

        return Object.freeze({
            personName: (personName ?? '').trim(),
            companyName: (companyName ?? '').trim(),
        });
    }
}
