/**
 * Packed bit strings, and the padding and chunking used to map them onto word indices.
 *
 * A {@link BitString | **BitString**} stores its bits most-significant first in a `Uint8Array`, with an explicit
 * `length` in bits; any unused bits of the last byte are always zero.
 */
import { assert, assertArgument } from '../utils/errors.js';

/**
 * The largest number of bits a single word may carry.
 *
 * @category Encoding
 */
export const MaxChunkSize = 32;

/**
 * An ordered sequence of bits.
 *
 * @category Encoding
 */
export interface BitString {
    /**
     * The packed bits, most-significant bit of each byte first.
     */
    readonly data: Uint8Array;

    /**
     * The number of bits.
     */
    readonly length: number;
}

/**
 * The result of {@link padToMultiple | **padToMultiple**}.
 *
 * @category Encoding
 */
export interface PaddedBits {
    bits: BitString;

    /**
     * The number of zero bits appended, always less than the chunk size.
     */
    padding: number;
}

function getBit(bits: BitString, offset: number): number {
    return (bits.data[offset >> 3] >> (7 - (offset % 8))) & 1;
}

function setBit(data: Uint8Array, offset: number): void {
    data[offset >> 3] |= 1 << (7 - (offset % 8));
}

function allocate(length: number): Uint8Array {
    return new Uint8Array(Math.ceil(length / 8));
}

function sliceBits(bits: BitString, start: number, count: number): BitString {
    const data = allocate(count);
    for (let i = 0; i < count; i++) {
        if (getBit(bits, start + i)) {
            setBit(data, i);
        }
    }
    return { data, length: count };
}

/**
 * Throws unless `chunkSize` is a usable number of bits per word.
 *
 * @ignore
 */
export function assertChunkSize(chunkSize: number): void {
    assertArgument(
        Number.isInteger(chunkSize) && chunkSize >= 1 && chunkSize <= MaxChunkSize,
        `chunk size must be an integer between 1 and ${MaxChunkSize}`,
        'chunkSize',
        chunkSize,
    );
}

/**
 * Expands each byte of `data` into 8 bits, most-significant bit first.
 *
 * @category Encoding
 * @param {Uint8Array} data - The bytes to expand.
 * @returns {BitString} A bit string of `8 * data.length` bits.
 */
export function bytesToBits(data: Uint8Array): BitString {
    return { data: new Uint8Array(data), length: data.length * 8 };
}

/**
 * Packs `bits` back into bytes.
 *
 * Only 7-bit ASCII payloads are ever encoded, so any byte with the high bit set means the bits did not come from the
 * encoder.
 *
 * @category Encoding
 * @param {BitString} bits - The bits to pack; the length must be a multiple of 8.
 * @returns {Uint8Array} The bytes.
 * @throws {InvalidBitLengthError} If the length is not a multiple of 8.
 * @throws {NonAsciiByteError} If a byte is 128 or larger.
 */
export function bitsToBytes(bits: BitString): Uint8Array {
    assert(bits.length % 8 === 0, 'bit length is not a multiple of 8', 'INVALID_BIT_LENGTH', {
        length: bits.length,
        multiple: 8,
    });

    const result = bits.data.slice(0, bits.length / 8);
    for (let offset = 0; offset < result.length; offset++) {
        assert(result[offset] < 0x80, 'decoded byte is not ASCII', 'NON_ASCII_BYTE', {
            offset,
            value: result[offset],
        });
    }
    return result;
}

/**
 * Appends zero bits to `bits` until its length is a multiple of `chunkSize`.
 *
 * @category Encoding
 * @param {BitString} bits - The bits to pad.
 * @param {number} chunkSize - The number of bits per chunk.
 * @returns {PaddedBits} The padded bits and the number of zero bits appended.
 */
export function padToMultiple(bits: BitString, chunkSize: number): PaddedBits {
    assertChunkSize(chunkSize);

    const padding = (chunkSize - (bits.length % chunkSize)) % chunkSize;
    const length = bits.length + padding;

    // The unused bits of the source are already zero, so a widened copy is correctly padded
    const data = allocate(length);
    data.set(bits.data.subarray(0, Math.min(bits.data.length, data.length)));

    return { bits: { data, length }, padding };
}

/**
 * Splits `bits` into consecutive chunks of `chunkSize` bits.
 *
 * @category Encoding
 * @param {BitString} bits - The bits to split; the length must be a multiple of `chunkSize`.
 * @param {number} chunkSize - The number of bits per chunk.
 * @returns {BitString[]} The chunks, in order.
 * @throws {InvalidBitLengthError} If the bits were not padded to a multiple of `chunkSize`.
 */
export function splitChunks(bits: BitString, chunkSize: number): Array<BitString> {
    assertChunkSize(chunkSize);
    assert(bits.length % chunkSize === 0, 'bit length is not a multiple of the chunk size', 'INVALID_BIT_LENGTH', {
        length: bits.length,
        multiple: chunkSize,
    });

    const chunks: Array<BitString> = [];
    for (let offset = 0; offset < bits.length; offset += chunkSize) {
        chunks.push(sliceBits(bits, offset, chunkSize));
    }
    return chunks;
}

/**
 * Joins `chunks` into a single bit string.
 *
 * @category Encoding
 */
export function concatBits(chunks: ReadonlyArray<BitString>): BitString {
    const length = chunks.reduce((accum, chunk) => accum + chunk.length, 0);
    const data = allocate(length);

    let offset = 0;
    for (const chunk of chunks) {
        for (let i = 0; i < chunk.length; i++) {
            if (getBit(chunk, i)) {
                setBit(data, offset);
            }
            offset++;
        }
    }

    return { data, length };
}

/**
 * Reads `chunk` as an unsigned, most-significant bit first, integer.
 *
 * @category Encoding
 * @param {BitString} chunk - At most {@link MaxChunkSize | **MaxChunkSize**} bits.
 * @returns {number} The value, in `[0, 2^chunk.length - 1]`.
 */
export function chunkToIndex(chunk: BitString): number {
    assertChunkSize(chunk.length);

    let index = 0;
    for (let i = 0; i < chunk.length; i++) {
        index = index * 2 + getBit(chunk, i);
    }
    return index;
}

/**
 * Writes `index` as a `chunkSize` bit unsigned integer, most-significant bit first.
 *
 * @category Encoding
 * @param {number} index - The value to write.
 * @param {number} chunkSize - The number of bits.
 * @returns {BitString} The chunk.
 * @throws {IndexOutOfChunkRangeError} If `index` needs more than `chunkSize` bits.
 */
export function indexToChunk(index: number, chunkSize: number): BitString {
    assertChunkSize(chunkSize);
    assertArgument(Number.isSafeInteger(index) && index >= 0, 'invalid index', 'index', index);
    assert(index < 2 ** chunkSize, `index does not fit in ${chunkSize} bits`, 'INDEX_OUT_OF_CHUNK_RANGE', {
        index,
        chunkSize,
    });

    const data = allocate(chunkSize);
    for (let bit = 0; bit < chunkSize; bit++) {
        if (Math.floor(index / 2 ** (chunkSize - 1 - bit)) % 2) {
            setBit(data, bit);
        }
    }
    return { data, length: chunkSize };
}

/**
 * Drops the last `padding` bits of `bits`.
 *
 * @category Encoding
 * @param {BitString} bits - The padded bits.
 * @param {number} padding - The number of bits to remove.
 * @returns {BitString} The bits without padding.
 * @throws {PaddingExceedsLengthError} If `padding` is larger than the number of bits.
 */
export function removePadding(bits: BitString, padding: number): BitString {
    assertArgument(Number.isSafeInteger(padding) && padding >= 0, 'invalid padding', 'padding', padding);
    assert(padding <= bits.length, 'padding exceeds the number of bits', 'PADDING_EXCEEDS_LENGTH', {
        padding,
        length: bits.length,
    });

    return sliceBits(bits, 0, bits.length - padding);
}

/**
 * Renders `bits` as a string of `0` and `1` characters.
 *
 * @category Encoding
 */
export function formatBits(bits: BitString): string {
    let result = '';
    for (let i = 0; i < bits.length; i++) {
        result += getBit(bits, i) ? '1' : '0';
    }
    return result;
}
