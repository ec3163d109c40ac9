import { decodeText } from './byte-codec';
import { ByteSource } from './byte-source';
import { FrameEncoding } from './frame-classes';
import genres from './data/id3v1-genres.json';

/*
 **  ID3v1 and v1.1: 128 bytes at the very end of the file, starting 'TAG'.
 **  v1-Extended: 227 more bytes right before it, starting 'TAG+'.
 */
export const V1_BYTE_SIZE = 128;
export const V1_EXTENDED_BYTE_SIZE = 227;

export interface Id3v1Tag {
    /* v1.1 steals the last two comment bytes for the track number */
    version: 'v1' | 'v1.1';
    title: string;
    artist: string;
    album: string;
    year: string;
    comment: string;
    /* 0 in a v1 tag */
    track: number;
    /* Index in the genre list, 255 when unset */
    genre: number;
}

export interface Id3v1ExtendedTag {
    title: string;
    artist: string;
    album: string;
    speed: number;
    genre: string;
    /* In milliseconds, 0 when unset */
    startTime: number;
    endTime: number;
}

/*
 **  Latin-1 string of a fixed width field, cut at the first NUL.
 **  Trailing space padding is dropped.
 */
function fixedString(bytes: Buffer, start: number, length: number): string {
    const end = bytes.indexOf(0x00, start);
    return decodeText(FrameEncoding.Latin1, bytes, start, end === -1 || end > start + length ? start + length : end).trimEnd();
}

/*
 **  Name of an ID3v1 genre, '' when the index is out of range
 */
export function genreName(index: number): string {
    return Number.isInteger(index) && index >= 0 && index < genres.length ? genres[index] : '';
}

/*
 **  '17' => 'Rock', '(17)Grunge' => 'Grunge', '(17)' => 'Rock'.
 **  Anything else is returned as is.
 */
export function processGenre(genre: string): string {
    if (genre === '') {
        return '';
    }
    if (/^[0-9]+$/.test(genre)) {
        return genreName(Number.parseInt(genre, 10));
    }
    const match = /^\((\d+)\)/.exec(genre);
    if (match === null) {
        return genre;
    }
    const rest = genre.slice(match[0].length);
    return rest === '' ? genreName(Number.parseInt(match[1], 10)) : rest;
}

/*
 **  'mmm:ss' => milliseconds, 0 when it can't be parsed
 */
export function parseTime(time: string): number {
    const match = /^\s*(\d{1,3}):(\d{1,2})\s*$/.exec(time);
    if (match === null) {
        return 0;
    }
    return (Number.parseInt(match[1], 10) * 60 + Number.parseInt(match[2], 10)) * 1000;
}

/*
 **  A zero before a non-zero last comment byte means v1.1
 */
export function parseId3v1(bytes: Buffer): Id3v1Tag | null {
    if (bytes.length !== V1_BYTE_SIZE || bytes.toString('latin1', 0, 3) !== 'TAG') {
        return null;
    }
    const v11 = bytes[125] === 0x00 && bytes[126] !== 0x00;
    return {
        version: v11 ? 'v1.1' : 'v1',
        title: fixedString(bytes, 3, 30),
        artist: fixedString(bytes, 33, 30),
        album: fixedString(bytes, 63, 30),
        year: fixedString(bytes, 93, 4),
        comment: fixedString(bytes, 97, v11 ? 28 : 30),
        track: v11 ? bytes[126] : 0,
        genre: bytes[127],
    };
}

export function parseId3v1Extended(bytes: Buffer): Id3v1ExtendedTag | null {
    if (bytes.length !== V1_EXTENDED_BYTE_SIZE || bytes.toString('latin1', 0, 4) !== 'TAG+') {
        return null;
    }
    return {
        title: fixedString(bytes, 4, 60),
        artist: fixedString(bytes, 64, 60),
        album: fixedString(bytes, 124, 60),
        speed: bytes[184],
        genre: fixedString(bytes, 185, 30),
        startTime: parseTime(fixedString(bytes, 215, 6)),
        endTime: parseTime(fixedString(bytes, 221, 6)),
    };
}

export interface Id3v1Blocks {
    tag: Id3v1Tag | null;
    extended: Id3v1ExtendedTag | null;
}

/*
 **  Looks for the v1 blocks at the end of the source. The extended block
 **  only counts when a v1 block follows it.
 */
export function readId3v1(source: ByteSource): Id3v1Blocks {
    const size = source.size();
    if (size < V1_BYTE_SIZE) {
        return { tag: null, extended: null };
    }
    const block = source.read(size - V1_BYTE_SIZE, V1_BYTE_SIZE);
    const tag = block === null ? null : parseId3v1(block);
    if (tag === null || size < V1_BYTE_SIZE + V1_EXTENDED_BYTE_SIZE) {
        return { tag, extended: null };
    }
    const extendedBlock = source.read(size - V1_BYTE_SIZE - V1_EXTENDED_BYTE_SIZE, V1_EXTENDED_BYTE_SIZE);
    return { tag, extended: extendedBlock === null ? null : parseId3v1Extended(extendedBlock) };
}

/*
 **  Bytes the v1 blocks take at the end of a file
 */
export function id3v1Size(blocks: Id3v1Blocks): number {
    return (blocks.tag === null ? 0 : V1_BYTE_SIZE) + (blocks.extended === null ? 0 : V1_EXTENDED_BYTE_SIZE);
}
