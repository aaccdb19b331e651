export class PhoneNormalizer {

    static digitsOf(phone: string): string {
        return phone.replace(/\D/g, '');
    }

    /**
     * Digits with the default country code dropped from 11-digit numbers.
     */
    static nationalDigits(phone: string, countryCode = '1'): string {
        const digits = this.digitsOf(phone);
        if (digits.length === 10 + countryCode.length && digits.startsWith(countryCode)) {
            return digits.substring(countryCode.length);
        }
        return digits;
    }

    /**
     * 10 digits render as `(415) 555-0199`, longer numbers as `+<digits>`;
     * anything shorter comes back as bare digits for the validator to reject.
     */
    static normalize(phone: string, countryCode = '1'): string {
        const digits = this.nationalDigits(phone, countryCode);

        if (digits.length === 10) {
            return `(${digits.substring(0, 3)}) ${digits.substring(3, 6)}-${digits.substring(6)}`;
        }
        if (digits.length > 10) {
            return `+${digits}`;
        }
        return digits;
    }
}
