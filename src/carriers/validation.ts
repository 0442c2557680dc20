import { Carrier } from '../domain/models';

const FEDEX_PATTERNS = [
    /^\d{12}$/,     // Express
    /^\d{14}$/,     // Ground (96-prefix stripped)
    /^\d{15}$/,     // Ground / SmartPost
    /^\d{20}$/,     // Ground with SSCC prefix
    /^\d{22}$/,     // Ground barcode
];

const UPS_PATTERNS = [
    /^1Z[0-9A-Z]{16}$/,
    /^\d{12}$/,
    /^\d{18}$/,
    /^\d{22,25}$/,     // Mail Innovations
    /^T\d{10}$/,       // InfoNotice
];

const DHL_PATTERNS = [
    /^[A-Z]{2}\d{9}[A-Z]{2}$/,
    /^\d{10,30}$/,
    /^GM\d{17}$/,
    /^420\d{27}$/,
    /^[A-Z0-9]{10,30}$/,
];

const ONTRAC_PATTERN = /^[CD]\d{14}$/;

/**
 * Strips whitespace and separators and upper-cases; every carrier is
 * validated and queried in this form.
 */
export function canonicalTrackingNumber(candidate: string): string {
    return candidate.replace(/[^a-zA-Z0-9]/g, '').toUpperCase();
}

/**
 * Check digit for an OnTrac number, given its first 14 characters
 * (prefix letter + 13 digits). Returns null when the input is not in that shape.
 */
export function computeOnTracCheckDigit(prefix: string): number | null {
    const body = prefix.toUpperCase();
    if (!/^[A-Z]\d{13}$/.test(body)) return null;

    // letters map to their alphabet position, last digit only: C -> 3, D -> 4
    const letterValue = (body.charCodeAt(0) - 'A'.charCodeAt(0) + 1) % 10;
    const digits = [letterValue, ...body.slice(1).split('').map(Number)];

    let oddSum = 0;
    let evenSum = 0;
    digits.forEach((digit, i) => {
        if (i % 2 === 0) oddSum += digit;     // position i + 1 is odd
        else evenSum += digit;
    });

    const total = oddSum + evenSum * 2;
    const remainder = total % 10;
    return remainder === 0 ? 0 : 10 - remainder;
}

function isValidOnTrac(value: string): boolean {
    if (!ONTRAC_PATTERN.test(value)) return false;
    const expected = computeOnTracCheckDigit(value.slice(0, 14));
    return expected !== null && expected === Number(value[14]);
}

export function validateTrackingNumber(carrier: Carrier, candidate: string): boolean {
    if (typeof candidate !== 'string') return false;
    const value = canonicalTrackingNumber(candidate);
    if (!value) return false;

    switch (carrier) {
        case Carrier.FedEx:
            return FEDEX_PATTERNS.some(p => p.test(value));
        case Carrier.UPS:
            return UPS_PATTERNS.some(p => p.test(value));
        case Carrier.DHL:
            return value.length >= 10 && value.length <= 30 && DHL_PATTERNS.some(p => p.test(value));
        case Carrier.OnTrac:
            return isValidOnTrac(value);
        default:
            return false;
    }
}
