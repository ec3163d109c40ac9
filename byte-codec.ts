import * as iconv from 'iconv-lite';
import { FrameEncoding } from './frame-classes';

/*
 **  Decodes a big-endian integer. Synchsafe integers only use the low
 **  7 bits of each byte, the high bit is ignored rather than validated.
 */
export function decodeInt(bytes: Uint8Array, synchsafe = false): number {
    const base = synchsafe ? 0x80 : 0x100;
    const mask = synchsafe ? 0x7F : 0xFF;
    let value = 0;
    for (const byte of bytes) {
        value = value * base + (byte & mask);
    }
    return value;
}

export function decodeBigInt(bytes: Uint8Array, synchsafe = false): bigint {
    const bits = synchsafe ? 7n : 8n;
    const mask = synchsafe ? 0x7F : 0xFF;
    let value = 0n;
    for (const byte of bytes) {
        value = (value << bits) | BigInt(byte & mask);
    }
    return value;
}

/*
 **  Spreads value over length bytes, big-endian.
 **  length 0 => as few bytes as the value needs (at least one)
 **  Values that don't fit are clamped to the largest one that does.
 */
export function encodeInt(value: number | bigint, length = 0, synchsafe = false): Buffer {
    const bits = synchsafe ? 7n : 8n;
    const mask = synchsafe ? 0x7Fn : 0xFFn;
    let remaining = toUnsigned(value);

    let width = length;
    if (width <= 0) {
        width = 1;
        while (remaining >> (bits * BigInt(width)) > 0n) {
            width++;
        }
    }

    const max = (1n << (bits * BigInt(width))) - 1n;
    if (remaining > max) {
        remaining = max;
    }

    const bytes = Buffer.alloc(width);
    for (let i = width - 1; i >= 0; i--) {
        bytes[i] = Number(remaining & mask);
        remaining >>= bits;
    }
    return bytes;
}

function toUnsigned(value: number | bigint): bigint {
    if (typeof value === 'bigint') {
        return value < 0n ? 0n : value;
    }
    if (!Number.isFinite(value) || value <= 0) {
        return 0n;
    }
    return BigInt(Math.trunc(value));
}

export function getEncodingName(encoding: number): string {
    switch (encoding) {
        case FrameEncoding.UTF16BOM:
            return 'utf-16le';
        case FrameEncoding.UTF16BE:
            return 'utf-16be';
        case FrameEncoding.UTF8:
            return 'utf8';
        case FrameEncoding.Latin1:
        default:
            return 'ISO-8859-1';    // Latin-1
    }
}

/*
 **  Number of NUL bytes that end a string in this encoding
 */
export function getTerminationCount(encoding: number): number {
    return encoding === FrameEncoding.UTF16BOM || encoding === FrameEncoding.UTF16BE ? 2 : 1;
}

/*
 **  Decodes bytes[start, end) using an ID3 encoding byte.
 **  Unknown encodings are read as Latin-1. UTF-16 honours a leading BOM
 **  and falls back to big-endian when there is none.
 */
export function decodeText(encoding: number, bytes: Uint8Array, start = 0, end = bytes.length): string {
    const data = Buffer.from(bytes.subarray(start, end));
    switch (encoding) {
        case FrameEncoding.UTF16BOM:
            if (data.length >= 2 && data[0] === 0xFF && data[1] === 0xFE) {
                return iconv.decode(data.subarray(2), 'utf-16le');
            }
            if (data.length >= 2 && data[0] === 0xFE && data[1] === 0xFF) {
                return iconv.decode(data.subarray(2), 'utf-16be');
            }
            return iconv.decode(data, 'utf-16be');
        case FrameEncoding.UTF16BE:
            return iconv.decode(data, 'utf-16be');
        case FrameEncoding.UTF8:
            return iconv.decode(data, 'utf8');
        default:
            return iconv.decode(data, 'ISO-8859-1');
    }
}

/*
 **  UTF-16 with BOM is written little-endian
 */
export function encodeText(text: string, encoding: number): Buffer {
    const encoded = iconv.encode(text, getEncodingName(encoding));
    if (encoding === FrameEncoding.UTF16BOM) {
        return Buffer.concat([Buffer.from([0xFF, 0xFE]), encoded]);
    }
    return encoded;
}

/*
 **  Index of the terminator that ends the string starting at start, or -1.
 **  Wide encodings need two NUL bytes on a character boundary.
 */
export function findTerminator(bytes: Uint8Array, start: number, encoding: number): number {
    if (getTerminationCount(encoding) === 1) {
        for (let i = start; i < bytes.length; i++) {
            if (bytes[i] === 0x00) {
                return i;
            }
        }
        return -1;
    }
    for (let i = start; i + 1 < bytes.length; i += 2) {
        if (bytes[i] === 0x00 && bytes[i + 1] === 0x00) {
            return i;
        }
    }
    return -1;
}

/*
 **  Drops the 0x00 the encoder stuffed after 0xFF wherever the next byte
 **  would look like a sync signal (FF 00 b, b & 0xE0). Bytes before start
 **  (the frame header) are copied unchanged.
 */
export function removeUnsynchronisation(bytes: Uint8Array, start = 0): Buffer {
    const out: number[] = Array.from(bytes.subarray(0, start));
    let i = start;
    while (i < bytes.length) {
        if (bytes[i] === 0xFF && i + 2 < bytes.length && bytes[i + 1] === 0x00 && (bytes[i + 2] & 0xE0) !== 0) {
            out.push(0xFF, bytes[i + 2]);
            i += 3;
        } else {
            out.push(bytes[i]);
            i++;
        }
    }
    return Buffer.from(out);
}

export function isAscii(text: string): boolean {
    return /^[\x00-\x7F]*$/.test(text);
}
