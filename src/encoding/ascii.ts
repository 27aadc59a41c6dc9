/**
 * Conversion between strings and 7-bit ASCII bytes.
 */
import { assert } from '../utils/errors.js';

/**
 * Returns true if every character of `value` is 7-bit ASCII.
 *
 * @category Encoding
 */
export function isAscii(value: string): boolean {
    return /^[\x00-\x7f]*$/.test(value);
}

/**
 * Returns the ASCII bytes of `value`, one byte per character.
 *
 * @category Encoding
 * @param {string} value - The string to convert.
 * @returns {Uint8Array} The bytes.
 * @throws {NonAsciiInputError} At the first character outside the ASCII range.
 */
export function toAsciiBytes(value: string): Uint8Array {
    const result = new Uint8Array(value.length);
    for (let i = 0; i < value.length; i++) {
        const code = value.charCodeAt(i);
        if (code >= 0x80) {
            const codePoint = value.codePointAt(i) ?? code;
            assert(false, 'input must contain only ASCII characters', 'NON_ASCII_INPUT', {
                position: i,
                character: String.fromCodePoint(codePoint),
                converted: value.substring(0, i),
            });
        }
        result[i] = code;
    }
    return result;
}

/**
 * Returns the string for the ASCII `bytes`.
 *
 * @category Encoding
 * @param {Uint8Array} bytes - Bytes below 128, as produced by {@link bitsToBytes | **bitsToBytes**}.
 * @returns {string} The string.
 */
export function toAsciiString(bytes: Uint8Array): string {
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
        result += String.fromCharCode(bytes[i]);
    }
    return result;
}
