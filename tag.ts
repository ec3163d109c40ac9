import * as fs from 'fs';
import { encodeInt, decodeInt } from './byte-codec';
import { BufferSource, ByteSource, FileSource } from './byte-source';
import { config } from './config';
import { FileFormatError, FileNotFoundError, NotMp3FileError, TagSizeError, WriteError } from './errors';
import { EventTimingFrame } from './event-timing-frame';
import {
    EventTimingCode,
    Picture,
    PictureType,
    TagHeaderInfo,
    TagVersion,
    TagsOnFile,
    TimeStampFormat,
    TimingCode,
} from './frame-classes';
import { FrameType, WRITE_VERSION } from './frame-definitions';
import { Frame, HEADER_BYTE_SIZE, UnknownFrame } from './frame';
import { FrameFactory } from './frame-factory';
import { FrameID } from './frame-id';
import { Id3v1Blocks, genreName, id3v1Size, processGenre, readId3v1 } from './id3v1';
import { createLogger } from './logger';
import { PictureFrame, PictureInit } from './picture-frame';
import { PlayCountFrame, PopularimeterFrame, toPlayCount } from './play-count-frames';
import { DescriptiveTextFrame, NumericalTextFrame, TextFrame } from './text-frames';

const log = createLogger('tag');

/*
 **  Largest tag body a synchsafe size can describe
 */
export const MAX_TAG_SIZE = 0x0FFFFFFF;

const SUPPORTED_MINOR_VERSION = 0;
const MIN_SUPPORTED_VERSION = 2;
const MAX_SUPPORTED_VERSION = 4;

/*
 **  "ID3" may be preceded by a few stray bytes
 */
const TAG_SEARCH_LENGTH = 20;

const TagFlags = {
    unsynchronised: 0x80,
    extendedHeader: 0x40,
    experimental: 0x20,
    footer: 0x10,
} as const;

const YEAR_LENGTH = 4;

export interface WriteOptions {
    /* Zero bytes after the frames, defaults to ID3_PADDING_SIZE */
    padding?: number;
    /* Keep the first front cover only */
    discardNonCoverPictures?: boolean;
    /* Drop frames this library can't decode */
    discardUnknown?: boolean;
}

export interface TextInit {
    description?: string;
    language?: string;
}

export interface TextEntry {
    content: string;
    description: string;
    language: string;
}

type FrameConstructor<T extends Frame> = abstract new (...args: never[]) => T;

function toFrameID(id: FrameID | FrameType | string): FrameID {
    return id instanceof FrameID ? id : FrameID.fromAlias(id);
}

function toTagVersion(majorVersion: number): TagVersion {
    switch (majorVersion) {
        case 2:
            return TagVersion.v22;
        case 3:
            return TagVersion.v23;
        case 4:
            return TagVersion.v24;
        default:
            return TagVersion.unknown;
    }
}

function isDigits(value: string): boolean {
    return /^[0-9]+$/.test(value);
}

/*
 **  Offset of "ID3" within the first bytes of data, -1 if there is none
 */
export function findTagStart(data: Buffer): number {
    const position = data.subarray(0, TAG_SEARCH_LENGTH + 3).indexOf('ID3', 0, 'latin1');
    return position >= 0 && position <= TAG_SEARCH_LENGTH ? position : -1;
}

/*
 **  Reads the ID3v2 header found at the start of the source. null when
 **  there is no header or its size isn't synchsafe.
 */
export function readTagHeader(source: ByteSource): TagHeaderInfo | null {
    const lead = source.read(0, Math.min(source.size(), TAG_SEARCH_LENGTH + HEADER_BYTE_SIZE));
    if (lead === null) {
        return null;
    }
    const start = findTagStart(lead);
    if (start === -1) {
        return null;
    }
    const header = source.read(start, HEADER_BYTE_SIZE);
    if (header === null) {
        return null;
    }

    const sizeBytes = header.subarray(6, 10);
    if ((sizeBytes[0] | sizeBytes[1] | sizeBytes[2] | sizeBytes[3]) & 0x80) {
        log.warn({ start }, 'tag size is not synchsafe');
        return null;
    }

    const flags = header[5];
    const footer = (flags & TagFlags.footer) !== 0;
    const size = decodeInt(sizeBytes, true);
    return {
        version: toTagVersion(header[3]),
        majorVersion: header[3],
        minorVersion: header[4],
        unsynchronised: (flags & TagFlags.unsynchronised) !== 0,
        extendedHeader: (flags & TagFlags.extendedHeader) !== 0,
        experimental: (flags & TagFlags.experimental) !== 0,
        footer,
        start,
        size,
        totalSize: HEADER_BYTE_SIZE + size + (footer ? HEADER_BYTE_SIZE : 0),
    };
}

/*
 **  Header of a v2.4 tag with no flags set
 */
export function createTagHeader(size: number): Buffer {
    if (size > MAX_TAG_SIZE) {
        throw new TagSizeError(size);
    }
    const header = Buffer.alloc(HEADER_BYTE_SIZE);
    header.write('ID3', 0, 'latin1');
    header[3] = WRITE_VERSION;
    header[4] = SUPPORTED_MINOR_VERSION;
    header[5] = 0x00;
    encodeInt(size, 4, true).copy(header, 6);
    return header;
}

/*
 **  Removes the ID3v2 tag, and anything before it, from data
 */
export function removeTagsFromBuffer(data: Buffer): Buffer {
    const start = findTagStart(data);
    if (start === -1) {
        return data;
    }
    const header = readTagHeader(new BufferSource(data));
    if (header === null) {
        throw new FileFormatError('ID3v2 tag has an invalid size');
    }
    return data.subarray(Math.min(data.length, header.start + header.totalSize));
}

/*
 **  Only .mp3, .mp4 and .tag files are touched
 */
function validateFileLocation(path: string): void {
    if (!/\.(?:mp3|mp4|tag)$/i.test(path)) {
        throw new NotMp3FileError(path);
    }
}

function readWholeFile(path: string): Buffer {
    try {
        return fs.readFileSync(path);
    } catch (err) {
        throw new FileNotFoundError(path, err);
    }
}

/*
 **  Strips the ID3v2 tag from a file
 */
export function removeTags(path: string): void {
    validateFileLocation(path);
    const data = readWholeFile(path);
    const stripped = removeTagsFromBuffer(data);
    if (stripped.length === data.length) {
        return;
    }
    try {
        fs.writeFileSync(path, stripped);
    } catch (err) {
        throw new WriteError(path, err);
    }
    log.info({ path, removed: data.length - stripped.length }, 'tag removed');
}

/*
 **  ID3 tags of one file or buffer. Frames are kept in the order they were
 **  added, grouped by id.
 */
export class Tag {
    private readonly frames = new Map<FrameType, Frame[]>();
    private readonly factory = new FrameFactory();
    private readonly found: TagsOnFile = { v1: false, v1_1: false, v1Extended: false, v2: false };
    private header: TagHeaderInfo | null = null;
    private paddingStart = 0;
    private fileName = '';
    private fileSize = 0;

    public static fromBuffer(buffer: Buffer): Tag {
        const tag = new Tag();
        tag.read(new BufferSource(buffer));
        return tag;
    }

    public static fromFile(path: string): Tag {
        validateFileLocation(path);
        let fd: number;
        try {
            fd = fs.openSync(path, 'r');
        } catch (err) {
            throw new FileNotFoundError(path, err);
        }
        const tag = new Tag();
        try {
            tag.read(new FileSource(fd, path));
        } finally {
            fs.closeSync(fd);
        }
        tag.fileName = path;
        return tag;
    }

    public get file(): string {
        return this.fileName;
    }

    /*
    **  Number of frames in the tag
    */
    public get size(): number {
        let count = 0;
        for (const list of this.frames.values()) {
            count += list.length;
        }
        return count;
    }

    public tagsOnFile(): TagsOnFile {
        return { ...this.found };
    }

    public headerInfo(): TagHeaderInfo | null {
        return this.header === null ? null : { ...this.header };
    }

    /*
    **  Bytes of padding after the last frame of the tag read
    */
    public paddingSize(): number {
        return this.header === null ? 0 : Math.max(0, HEADER_BYTE_SIZE + this.header.size - this.paddingStart);
    }

    /*
    **  'v1.1 v1Extended v2.3.0', with the tag flags when verbose
    */
    public versionString(verbose = false): string {
        let version = '';
        if (this.found.v1) {
            version = 'v1';
        } else if (this.found.v1_1) {
            version = 'v1.1';
        }
        if (this.found.v1Extended) {
            version += ' v1Extended';
        }
        if (this.found.v2 && this.header !== null) {
            version += version === '' ? '' : ' ';
            version += `v2.${this.header.majorVersion}.${this.header.minorVersion}`;
            if (verbose) {
                if (this.header.unsynchronised) {
                    version += ' -unsynchronisation';
                }
                if (this.header.extendedHeader) {
                    version += ' -extendedheader';
                }
                if (this.header.experimental) {
                    version += ' -experimental';
                }
                if (this.header.footer) {
                    version += ' -footer';
                }
            }
        }
        return version.trim();
    }

    /*
    **  Refuses null and empty frames, and a second frame for an id that
    **  only allows one. Frames with an unknown id are all kept.
    */
    public addFrame(frame: Frame): boolean {
        if (frame.isNull() || frame.isEmpty()) {
            return false;
        }
        const key = frame.id.type;
        const list = this.frames.get(key);
        if (list === undefined) {
            this.frames.set(key, [frame]);
            return true;
        }
        if (!frame.id.allowsMultiple() && !frame.id.isUnknown()) {
            return false;
        }
        list.push(frame);
        return true;
    }

    public getFrame(id: FrameID | FrameType | string): Frame | undefined {
        return this.getFrames(id)[0];
    }

    /*
    **  Frames for an id, null frames left out
    */
    public getFrames(id: FrameID | FrameType | string): Frame[] {
        return (this.frames.get(toFrameID(id).type) ?? []).filter(frame => !frame.isNull());
    }

    public hasFrame(id: FrameID | FrameType | string): boolean {
        return this.frames.has(toFrameID(id).type);
    }

    public removeFrames(id: FrameID | FrameType | string): number {
        const type = toFrameID(id).type;
        const removed = this.frames.get(type)?.length ?? 0;
        this.frames.delete(type);
        return removed;
    }

    /*
    **  Every frame, in insertion order
    */
    public frameList(): Frame[] {
        return [...this.frames.values()].flat();
    }

    public textString(id: FrameID | FrameType | string): string {
        return this.findFrame(id, TextFrame)?.content ?? '';
    }

    /*
    **  One entry per frame for ids that allow several, otherwise the values
    **  of the single frame. Never empty.
    */
    public textStrings(id: FrameID | FrameType | string): string[] {
        const frameId = toFrameID(id);
        if (frameId.allowsMultiple()) {
            const contents = this.findFrames(frameId, TextFrame).map(frame => frame.content);
            return contents.length > 0 ? contents : [''];
        }
        return this.findFrame(frameId, TextFrame)?.contents ?? [''];
    }

    /*
    **  One entry per text frame, with the description and language of
    **  descriptive frames (empty for the others)
    */
    public textEntries(id: FrameID | FrameType | string): TextEntry[] {
        return this.findFrames(id, TextFrame).map(frame => frame instanceof DescriptiveTextFrame
            ? { content: frame.content, description: frame.description, language: frame.language }
            : { content: frame.content, description: '', language: '' });
    }

    public numberValue(id: FrameID | FrameType | string): number {
        const frame = this.findFrame(id, TextFrame);
        if (frame instanceof NumericalTextFrame) {
            return frame.value;
        }
        const value = Number.parseInt(frame?.content ?? '', 10);
        return Number.isNaN(value) ? 0 : value;
    }

    /*
    **  Sets the content of the first frame with this id, creating it when
    **  missing. For ids that allow several frames, a description or language
    **  picks the frame having them, and a new frame is added when none does.
    **  An undecodable frame in the way is replaced.
    */
    public setText(id: FrameID | FrameType | string, text: string | string[], init: TextInit = {}): void {
        const frameId = toFrameID(id);
        const selective = frameId.allowsMultiple() && (init.description !== undefined || init.language !== undefined);
        const existing = selective ? this.matchingText(frameId, init) : this.getFrame(frameId);
        if (existing instanceof TextFrame) {
            if (Array.isArray(text)) {
                existing.contents = text;
            } else {
                existing.content = text;
            }
            if (existing instanceof DescriptiveTextFrame) {
                if (init.description !== undefined) {
                    existing.description = init.description;
                }
                if (init.language !== undefined) {
                    existing.language = init.language;
                }
            }
            return;
        }
        if (existing instanceof UnknownFrame) {
            this.removeFrames(frameId);
        }
        this.addFrame(Array.isArray(text)
            ? this.factory.createTexts(frameId, text)
            : this.factory.create(frameId, text, init.description, init.language));
    }

    public get title(): string {
        return this.textString(FrameType.TIT2);
    }

    public set title(value: string) {
        this.setText(FrameType.TIT2, value);
    }

    public get artist(): string {
        return this.textString(FrameType.TPE1);
    }

    public set artist(value: string) {
        this.setText(FrameType.TPE1, value);
    }

    public get albumArtist(): string {
        return this.textString(FrameType.TPE2);
    }

    public set albumArtist(value: string) {
        this.setText(FrameType.TPE2, value);
    }

    public get album(): string {
        return this.textString(FrameType.TALB);
    }

    public set album(value: string) {
        this.setText(FrameType.TALB, value);
    }

    public get composer(): string {
        return this.textString(FrameType.TCOM);
    }

    public set composer(value: string) {
        this.setText(FrameType.TCOM, value);
    }

    /*
    **  With ID3v1 genre references resolved to names
    */
    public get genre(): string {
        return processGenre(this.textString(FrameType.TCON));
    }

    public set genre(value: string) {
        this.setText(FrameType.TCON, value);
    }

    public genres(): string[] {
        return this.textStrings(FrameType.TCON).map(processGenre);
    }

    /*
    **  Sets the genre by its ID3v1 index
    */
    public setGenreIndex(index: number): void {
        this.setText(FrameType.TCON, genreName(index));
    }

    public get year(): string {
        const year = this.textString(FrameType.TYER);
        return year !== '' ? year : this.textString(FrameType.TDRC).slice(0, YEAR_LENGTH);
    }

    /*
    **  Written to both TYER and TDRC. TDRC keeps anything after its year.
    */
    public set year(value: string) {
        let year = value.slice(0, YEAR_LENGTH);
        if (isDigits(year)) {
            year = year.padStart(YEAR_LENGTH, '0');
            const recording = this.textString(FrameType.TDRC);
            this.setText(FrameType.TDRC, recording.length > YEAR_LENGTH ? year + recording.slice(YEAR_LENGTH) : year);
        } else {
            year = '';
            this.setText(FrameType.TDRC, '');
        }
        this.setText(FrameType.TYER, year);
    }

    public get track(): string {
        return this.textString(FrameType.TRCK).split('/')[0];
    }

    public set track(value: string) {
        this.setText(FrameType.TRCK, Tag.joinTotal(isDigits(value) ? value : '', this.trackTotal));
    }

    public get trackTotal(): string {
        return Tag.totalOf(this.textString(FrameType.TRCK));
    }

    public set trackTotal(value: string) {
        this.setText(FrameType.TRCK, Tag.joinTotal(this.track, isDigits(value) ? value : ''));
    }

    public get disc(): string {
        return this.textString(FrameType.TPOS).split('/')[0];
    }

    public set disc(value: string) {
        this.setText(FrameType.TPOS, Tag.joinTotal(isDigits(value) ? value : '', this.discTotal));
    }

    public get discTotal(): string {
        return Tag.totalOf(this.textString(FrameType.TPOS));
    }

    public set discTotal(value: string) {
        this.setText(FrameType.TPOS, Tag.joinTotal(this.disc, isDigits(value) ? value : ''));
    }

    public get comment(): string {
        return this.textString(FrameType.COMM);
    }

    public set comment(value: string) {
        this.setText(FrameType.COMM, value);
    }

    public get lyrics(): string {
        return this.textString(FrameType.USLT);
    }

    public set lyrics(value: string) {
        this.setText(FrameType.USLT, value);
    }

    /*
    **  First picture, or the first one of the given type
    */
    public picture(type?: PictureType): Picture | null {
        const frame = this.findFrames(FrameType.APIC, PictureFrame)
            .find(candidate => type === undefined || candidate.pictureType === type);
        return frame === undefined ? null : frame.toPicture();
    }

    public pictures(): Picture[] {
        return this.findFrames(FrameType.APIC, PictureFrame).map(frame => frame.toPicture());
    }

    /*
    **  Replaces the picture with the same description, or the same type for
    **  the two file icon types which may only appear once. Further matches
    **  are nulled so they aren't written.
    */
    public setPicture(picture: PictureInit): boolean {
        if (picture.data.length + HEADER_BYTE_SIZE > MAX_TAG_SIZE) {
            throw new TagSizeError(picture.data.length + HEADER_BYTE_SIZE);
        }
        const type = picture.type ?? PictureType.FrontCover;
        const description = picture.description ?? '';
        const singleType = type === PictureType.FileIcon || type === PictureType.OtherFileIcon;

        let target: PictureFrame | undefined;
        for (const frame of this.findFrames(FrameType.APIC, PictureFrame)) {
            if (frame.description !== description && !(singleType && frame.pictureType === type)) {
                continue;
            }
            if (target === undefined) {
                target = frame;
            } else {
                frame.setPicture(Buffer.alloc(0), '');
            }
        }

        if (target === undefined) {
            return this.addFrame(this.factory.createPicture({ ...picture, type, description }));
        }
        target.setPicture(picture.data, picture.mimeType);
        target.description = description;
        target.pictureType = type;
        return !target.isNull();
    }

    /*
    **  Without an email: PCNT, or the first popularimeter when there is none.
    **  With one: the popularimeter of that user, or PCNT when the tag has no
    **  popularimeter at all.
    */
    public playCount(email?: string): bigint {
        const popularimeters = this.findFrames(FrameType.POPM, PopularimeterFrame);
        const counter = this.findFrame(FrameType.PCNT, PlayCountFrame);
        if (email === undefined) {
            return counter?.playCount ?? popularimeters[0]?.playCount ?? 0n;
        }
        const match = popularimeters.find(frame => frame.email === email);
        if (match !== undefined) {
            return match.playCount;
        }
        return popularimeters.length === 0 ? counter?.playCount ?? 0n : 0n;
    }

    public setPlayCount(count: number | bigint, email?: string): void {
        const value = toPlayCount(count);
        if (email === undefined) {
            const counter = this.findFrame(FrameType.PCNT, PlayCountFrame);
            if (counter === undefined) {
                this.addFrame(this.factory.createPlayCount(value));
            } else {
                counter.playCount = value;
            }
            return;
        }
        const popularimeter = this.findFrames(FrameType.POPM, PopularimeterFrame).find(frame => frame.email === email);
        if (popularimeter === undefined) {
            this.addFrame(this.factory.createPopularimeter({ playCount: value, email }));
        } else {
            popularimeter.playCount = value;
        }
    }

    /*
    **  0-5 stars, 0 when unrated
    */
    public rating(email?: string): number {
        const popularimeters = this.findFrames(FrameType.POPM, PopularimeterFrame);
        const frame = email === undefined ? popularimeters[0] : popularimeters.find(candidate => candidate.email === email);
        return frame?.rating ?? 0;
    }

    public setRating(rating: number, email = ''): void {
        const popularimeter = this.findFrames(FrameType.POPM, PopularimeterFrame).find(frame => frame.email === email);
        if (popularimeter === undefined) {
            this.addFrame(this.factory.createPopularimeter({ rating, email }));
        } else {
            popularimeter.rating = rating;
        }
    }

    public timingCode(code: TimingCode): EventTimingCode {
        const frame = this.findFrame(FrameType.ETCO, EventTimingFrame);
        if (frame === undefined) {
            return { code, value: 0, milliseconds: true };
        }
        return { code, value: frame.value(code), milliseconds: frame.isMilliseconds() };
    }

    /*
    **  forceMilliseconds => existing MPEG frame timings are dropped so the
    **  frame can switch to milliseconds
    */
    public setTimingCode(code: TimingCode, value: number, forceMilliseconds = false): void {
        const frame = this.findFrame(FrameType.ETCO, EventTimingFrame);
        if (frame !== undefined) {
            if (forceMilliseconds && frame.format === TimeStampFormat.MPEGFrames) {
                frame.clear(TimeStampFormat.Milliseconds);
            }
            frame.setValue(code, value);
            return;
        }
        if (this.hasFrame(FrameType.ETCO)) {
            this.removeFrames(FrameType.ETCO);
        }
        this.addFrame(this.factory.createEventTiming(TimeStampFormat.Milliseconds, [[code, value]]));
    }

    /*
    **  Undoes every edit, frames left null or empty are dropped
    */
    public revert(): void {
        for (const [type, list] of this.frames) {
            const kept = list.filter(frame => {
                frame.revert();
                return !frame.isNull() && !frame.isEmpty();
            });
            if (kept.length === 0) {
                this.frames.delete(type);
            } else {
                this.frames.set(type, kept);
            }
        }
    }

    /*
    **  The tag as ID3v2.4 bytes, header and padding included
    */
    public toBuffer(options: WriteOptions = {}): Buffer {
        const frames = this.encodeFrames(options);
        const padding = Buffer.alloc(Math.max(0, options.padding ?? config.paddingSize));
        return Buffer.concat([createTagHeader(frames.length + padding.length), frames, padding]);
    }

    /*
    **  Replaces the tags of an audio buffer: the ID3v2 tag and any trailing
    **  ID3v1 blocks go, the new tag is put in front
    */
    public writeBuffer(data: Buffer, options: WriteOptions = {}): Buffer {
        const audio = removeTagsFromBuffer(data);
        const end = audio.length - id3v1Size(readId3v1(new BufferSource(audio)));
        return Buffer.concat([this.toBuffer(options), audio.subarray(0, end)]);
    }

    /*
    **  Writes the tag over the one on file when it fits and doesn't leave
    **  too much padding behind. Otherwise the file is rewritten with fresh
    **  padding and without its ID3v1 blocks.
    */
    public writeFile(path: string = this.fileName, options: WriteOptions = {}): void {
        validateFileLocation(path);
        let fd: number;
        try {
            fd = fs.openSync(path, 'r+');
        } catch (err) {
            throw new FileNotFoundError(path, err);
        }

        let written: { size: number; inPlace: boolean };
        try {
            written = this.writeToDescriptor(fd, path, options);
        } finally {
            fs.closeSync(fd);
        }

        log.info({ path, ...written }, 'tag written');
        this.prune(options);
        this.fileName = path;
        this.found.v1 = false;
        this.found.v1_1 = false;
        this.found.v1Extended = false;
        this.found.v2 = true;
    }

    private writeToDescriptor(fd: number, path: string, options: WriteOptions): { size: number; inPlace: boolean } {
        const source = new FileSource(fd, path);
        const fileSize = source.size();
        const onFile = readTagHeader(source);
        if (onFile !== null && onFile.start + onFile.totalSize > fileSize) {
            throw new FileFormatError(`Tag on ${path} is bigger than the file`);
        }
        const v1Bytes = id3v1Size(readId3v1(source));
        const frames = this.encodeFrames(options);

        const existing = onFile !== null && onFile.start === 0 ? onFile.totalSize : 0;
        const needed = HEADER_BYTE_SIZE + frames.length;
        const inPlace = existing >= needed && existing - needed <= config.maxPaddingReuse && v1Bytes === 0;

        if (inPlace) {
            const tag = Buffer.concat([
                createTagHeader(existing - HEADER_BYTE_SIZE),
                frames,
                Buffer.alloc(existing - needed),
            ]);
            try {
                fs.writeSync(fd, tag, 0, tag.length, 0);
            } catch (err) {
                throw new WriteError(path, err);
            }
            this.setWrittenHeader(tag.length - HEADER_BYTE_SIZE, needed);
            return { size: tag.length, inPlace };
        }

        const audioStart = onFile === null ? 0 : onFile.start + onFile.totalSize;
        const audioEnd = fileSize - v1Bytes;
        if (audioEnd < audioStart) {
            throw new FileFormatError(`ID3v1 and ID3v2 tags overlap on ${path}`);
        }
        const audio = source.read(audioStart, audioEnd - audioStart);
        if (audio === null) {
            throw new WriteError(path);
        }
        const padding = Buffer.alloc(Math.max(0, options.padding ?? config.paddingSize));
        const tag = Buffer.concat([createTagHeader(frames.length + padding.length), frames, padding]);
        try {
            fs.writeFileSync(path, Buffer.concat([tag, audio]));
        } catch (err) {
            throw new WriteError(path, err);
        }
        this.setWrittenHeader(tag.length - HEADER_BYTE_SIZE, needed);
        return { size: tag.length, inPlace };
    }

    private setWrittenHeader(size: number, paddingStart: number): void {
        this.header = {
            version: TagVersion.v24,
            majorVersion: WRITE_VERSION,
            minorVersion: SUPPORTED_MINOR_VERSION,
            unsynchronised: false,
            extendedHeader: false,
            experimental: false,
            footer: false,
            start: 0,
            size,
            totalSize: HEADER_BYTE_SIZE + size,
        };
        this.paddingStart = paddingStart;
    }

    /*
    **  Frame bytes of the tag, without header or padding
    */
    private encodeFrames(options: WriteOptions): Buffer {
        const parts: Buffer[] = [];
        let foundCover = false;
        for (const frame of this.frameList()) {
            if (frame.isNull() || frame.isEmpty()) {
                continue;
            }
            if (options.discardNonCoverPictures && frame instanceof PictureFrame) {
                if (foundCover || frame.pictureType !== PictureType.FrontCover) {
                    continue;
                }
                foundCover = true;
            }
            if (options.discardUnknown && frame instanceof UnknownFrame) {
                continue;
            }
            const bytes = frame.write();
            if (bytes.length > HEADER_BYTE_SIZE) {
                parts.push(bytes);
            }
        }
        const frames = Buffer.concat(parts);
        if (frames.length > MAX_TAG_SIZE) {
            throw new TagSizeError(frames.length);
        }
        return frames;
    }

    /*
    **  Drops what the last write left out
    */
    private prune(options: WriteOptions): void {
        let foundCover = false;
        for (const [type, list] of this.frames) {
            const kept = list.filter(frame => {
                if (frame.isNull() || frame.isEmpty()) {
                    return false;
                }
                if (options.discardNonCoverPictures && frame instanceof PictureFrame) {
                    if (foundCover || frame.pictureType !== PictureType.FrontCover) {
                        return false;
                    }
                    foundCover = true;
                }
                return !(options.discardUnknown && frame instanceof UnknownFrame);
            });
            if (kept.length === 0) {
                this.frames.delete(type);
            } else {
                this.frames.set(type, kept);
            }
        }
    }

    private read(source: ByteSource): void {
        this.fileSize = source.size();
        this.readV2(source);
        this.readV1(source);
    }

    private readV2(source: ByteSource): void {
        const header = readTagHeader(source);
        if (header === null) {
            return;
        }
        if (header.majorVersion < MIN_SUPPORTED_VERSION ||
            header.majorVersion > MAX_SUPPORTED_VERSION ||
            header.minorVersion !== SUPPORTED_MINOR_VERSION) {
            log.warn({ version: `2.${header.majorVersion}.${header.minorVersion}` }, 'unsupported ID3v2 version, tag skipped');
            return;
        }
        if (header.unsynchronised && header.majorVersion <= 3) {
            log.warn({ version: header.majorVersion }, 'tag-level unsynchronisation is not supported, tag skipped');
            return;
        }
        if (header.start + header.totalSize > this.fileSize) {
            throw new FileFormatError(`Tag of ${header.totalSize} bytes is bigger than the file (${this.fileSize} bytes)`);
        }

        let position = header.start + HEADER_BYTE_SIZE;
        if (header.extendedHeader) {
            // v2.2 uses this bit for compression
            if (header.majorVersion < 3) {
                log.warn('compressed ID3v2.2 tag skipped');
                return;
            }
            const sizeBytes = source.read(position, 4);
            if (sizeBytes === null) {
                return;
            }
            // The v2.4 size covers the whole extended header, v2.3 leaves out the size itself
            position += header.majorVersion >= 4 ? decodeInt(sizeBytes, true) : 4 + decodeInt(sizeBytes);
        }

        this.header = header;
        this.found.v2 = true;

        const tagEnd = header.start + HEADER_BYTE_SIZE + header.size;
        const frameHeaderSize = header.majorVersion < 3 ? 6 : HEADER_BYTE_SIZE;
        const factory = new FrameFactory(source, header.majorVersion, tagEnd);
        while (position + frameHeaderSize < tagEnd) {
            const result = factory.read(position);
            if (result.status === 'unreadable') {
                break;
            }
            if (result.status === 'parsed') {
                this.addFrame(result.frame);
            }
            position += result.size;
        }
        this.paddingStart = position - header.start;
    }

    private readV1(source: ByteSource): void {
        const blocks: Id3v1Blocks = readId3v1(source);
        if (blocks.extended !== null) {
            const extended = blocks.extended;
            this.found.v1Extended = true;
            this.addFrame(this.factory.create(FrameType.TIT2, extended.title));
            this.addFrame(this.factory.create(FrameType.TPE1, extended.artist));
            this.addFrame(this.factory.create(FrameType.TALB, extended.album));
            this.addFrame(this.factory.create(FrameType.TCON, extended.genre));
            if (extended.startTime > 0 && this.timingCode(TimingCode.InitialSilenceEnd).value === 0) {
                this.setTimingCode(TimingCode.InitialSilenceEnd, extended.startTime, true);
            }
            if (extended.endTime > 0 && this.timingCode(TimingCode.AudioEnd).value === 0) {
                this.setTimingCode(TimingCode.AudioEnd, extended.endTime, true);
            }
        }

        const tag = blocks.tag;
        if (tag === null) {
            return;
        }
        if (tag.version === 'v1.1') {
            this.found.v1_1 = true;
        } else {
            this.found.v1 = true;
        }
        // ID3v2 frames win, the v1 values only fill the gaps
        this.addFrame(this.factory.create(FrameType.TIT2, tag.title));
        this.addFrame(this.factory.create(FrameType.TPE1, tag.artist));
        this.addFrame(this.factory.create(FrameType.TALB, tag.album));
        this.addFrame(this.factory.create(FrameType.TYER, tag.year));
        if (!this.hasFrame(FrameType.COMM)) {
            this.addFrame(this.factory.create(FrameType.COMM, tag.comment));
        }
        if (tag.track > 0) {
            this.addFrame(this.factory.create(FrameType.TRCK, String(tag.track)));
        }
        this.addFrame(this.factory.create(FrameType.TCON, genreName(tag.genre)));
    }

    private matchingText(id: FrameID, init: TextInit): DescriptiveTextFrame | undefined {
        return this.findFrames(id, DescriptiveTextFrame).find(frame =>
            (init.description === undefined || frame.description === init.description) &&
            (init.language === undefined || frame.language === init.language));
    }

    private findFrame<T extends Frame>(id: FrameID | FrameType | string, kind: FrameConstructor<T>): T | undefined {
        return this.findFrames(id, kind)[0];
    }

    private findFrames<T extends Frame>(id: FrameID | FrameType | string, kind: FrameConstructor<T>): T[] {
        return this.getFrames(id).filter((frame): frame is T => frame instanceof kind);
    }

    private static totalOf(value: string): string {
        const slash = value.indexOf('/');
        return slash === -1 ? '' : value.slice(slash + 1);
    }

    private static joinTotal(value: string, total: string): string {
        return total === '' ? value : `${value}/${total}`;
    }
}
