import { decodeInt, encodeInt } from './byte-codec';
import { ByteSource } from './byte-source';
import { EventTimingFrame } from './event-timing-frame';
import { FrameClass, TimeStampFormat, TimingCode } from './frame-classes';
import { DescriptiveFrames, FrameType, NumericalFrames, WRITE_VERSION } from './frame-definitions';
import { Frame, FrameBytes, HEADER_BYTE_SIZE, UnknownFrame } from './frame';
import { FrameID } from './frame-id';
import { createLogger } from './logger';
import { PictureFrame, PictureInit } from './picture-frame';
import { PlayCountFrame, PopularimeterFrame, PopularimeterInit } from './play-count-frames';
import { DescriptiveTextFrame, NumericalTextFrame, TextFrame, URLTextFrame } from './text-frames';

const log = createLogger('frame-factory');

/*
 **  ID3v2.2 frames: 3 byte id, 3 byte size, no flags
 */
const LEGACY_HEADER_BYTE_SIZE = 6;

/*
 **  Set on every converted v2.2 frame (v2.4 "discard on tag alter")
 */
const LEGACY_STATUS_FLAGS = 0x40;

export type FrameReadResult =
    | { status: 'parsed' | 'invalid'; id: FrameID; frame: Frame; size: number }
    | { status: 'unreadable'; frame: UnknownFrame; reason: string };

/*
 **  Which frame class handles an id
 */
export function classifyFrame(id: FrameID): FrameClass {
    if (DescriptiveFrames.has(id.type)) {
        return FrameClass.DescriptiveText;
    }
    switch (id.type.charAt(0)) {
        case 'T':
            return NumericalFrames.has(id.type) ? FrameClass.NumericalText : FrameClass.Text;
        case 'W':
            return FrameClass.URLText;
        case 'A':
            return id.equals(FrameType.APIC) ? FrameClass.Picture : FrameClass.Unknown;
        case 'P':
            if (id.equals(FrameType.PCNT)) {
                return FrameClass.PlayCount;
            }
            return id.equals(FrameType.POPM) ? FrameClass.Popularimeter : FrameClass.Unknown;
        case 'E':
            return id.equals(FrameType.ETCO) ? FrameClass.EventTiming : FrameClass.Unknown;
        default:
            return FrameClass.Unknown;
    }
}

function toFrameID(id: FrameID | string): FrameID {
    return id instanceof FrameID ? id : FrameID.fromAlias(id);
}

/*
 **  Builds frames, either from the bytes of a tag or from values.
 **  Never throws: anything that can't be read comes back as a null
 **  UnknownFrame.
 **
 **  source  => where the tag lives, null for in-memory use only
 **  version => major version of the tag (2, 3 or 4)
 **  tagEnd  => first byte after the frames of the tag
 */
export class FrameFactory {
    constructor(
        private readonly source: ByteSource | null = null,
        private readonly version: number = WRITE_VERSION,
        private readonly tagEnd: number = source?.size() ?? 0,
    ) {}

    public get tagVersion(): number {
        return this.version;
    }

    public read(offset: number): FrameReadResult {
        const headerSize = this.version < 3 ? LEGACY_HEADER_BYTE_SIZE : HEADER_BYTE_SIZE;
        if (this.source === null) {
            return this.unreadable(offset, 'no byte source');
        }
        if (offset < 0 || offset + headerSize > this.tagEnd) {
            return this.unreadable(offset, 'header runs past the end of the tag');
        }

        const header = this.source.read(offset, headerSize);
        if (header === null) {
            return this.unreadable(offset, 'header could not be read');
        }

        const rawId = header.toString('latin1', 0, this.version < 3 ? 3 : 4);
        const size = this.version < 3
            ? decodeInt(header.subarray(3, 6))
            : decodeInt(header.subarray(4, 8), this.version >= 4);
        if (size === 0) {
            return this.unreadable(offset, 'zero frame size');
        }
        if (offset + headerSize + size > this.tagEnd) {
            return this.unreadable(offset, `frame ${rawId} of ${size} bytes runs past the end of the tag`);
        }

        const body = this.source.read(offset + headerSize, size);
        if (body === null) {
            return this.unreadable(offset, `body of ${rawId} could not be read`);
        }

        const id = new FrameID(rawId, this.version);
        const raw = this.version < 3
            ? Buffer.concat([FrameFactory.legacyHeader(id, size), body])
            : Buffer.concat([header, body]);
        const frame = FrameFactory.build(id, new FrameBytes(this.version, raw));
        if (frame.isNull()) {
            log.debug({ offset, frame: rawId, version: this.version }, 'frame is invalid');
        }
        return {
            status: frame.isNull() ? 'invalid' : 'parsed',
            id,
            frame,
            size: headerSize + size,
        };
    }

    /*
    **  create(offset)                              => frame read from the tag
    **  create(id, text, description, language)     => frame built from values
    */
    public create(offset: number): Frame;
    public create(id: FrameID | string, text?: string, description?: string, language?: string): Frame;
    public create(idOrOffset: FrameID | string | number, text = '', description = '', language = ''): Frame {
        if (typeof idOrOffset === 'number') {
            return this.read(idOrOffset).frame;
        }
        const id = toFrameID(idOrOffset);
        switch (classifyFrame(id)) {
            case FrameClass.DescriptiveText: {
                const options = DescriptiveFrames.get(id.type);
                return options === undefined
                    ? new UnknownFrame(id)
                    : new DescriptiveTextFrame(id, options, { content: text, description, language });
            }
            case FrameClass.NumericalText:
                return new NumericalTextFrame(id, text);
            case FrameClass.Text:
                return new TextFrame(id, text);
            case FrameClass.URLText:
                return new URLTextFrame(id, text);
            case FrameClass.Picture:
                return new PictureFrame({ data: Buffer.alloc(0), mimeType: '', description }, id);
            case FrameClass.PlayCount:
                return new PlayCountFrame(/^[0-9]+$/.test(text) ? BigInt(text) : 0n, id);
            case FrameClass.Popularimeter:
                return new PopularimeterFrame({ email: description }, id);
            case FrameClass.EventTiming:
                return new EventTimingFrame(TimeStampFormat.Milliseconds, [], id);
            default:
                return new UnknownFrame(id);
        }
    }

    /*
    **  Same as create(offset), with the id the frame was read under
    */
    public createPair(offset: number): [FrameID, Frame] {
        const result = this.read(offset);
        return result.status === 'unreadable' ? [result.frame.id, result.frame] : [result.id, result.frame];
    }

    /*
    **  Multiple values of a text frame, joined by the frame's separator
    */
    public createTexts(id: FrameID | string, values: string[]): Frame {
        const frame = this.create(id);
        if (frame instanceof TextFrame) {
            frame.contents = values;
        }
        return frame;
    }

    public createNumber(id: FrameID | string, value: number): Frame {
        return this.create(id, Number.isInteger(value) && value >= 0 ? String(value) : '');
    }

    public createPicture(picture: PictureInit, id: FrameID | string = FrameType.APIC): PictureFrame {
        return new PictureFrame(picture, toFrameID(id));
    }

    public createPlayCount(count: number | bigint): PlayCountFrame {
        return new PlayCountFrame(count);
    }

    public createPopularimeter(init: PopularimeterInit): PopularimeterFrame {
        return new PopularimeterFrame(init);
    }

    public createEventTiming(
        format: TimeStampFormat = TimeStampFormat.Milliseconds,
        entries: Iterable<readonly [TimingCode, number]> = [],
    ): EventTimingFrame {
        return new EventTimingFrame(format, entries);
    }

    /*
    **  Picks the frame class from the id and lets it decode itself
    */
    private static build(id: FrameID, source: FrameBytes): Frame {
        switch (classifyFrame(id)) {
            case FrameClass.DescriptiveText: {
                const options = DescriptiveFrames.get(id.type);
                return options === undefined ? new UnknownFrame(id, source) : new DescriptiveTextFrame(id, options, source);
            }
            case FrameClass.NumericalText:
                return new NumericalTextFrame(id, source);
            case FrameClass.Text:
                return new TextFrame(id, source);
            case FrameClass.URLText:
                return new URLTextFrame(id, source);
            case FrameClass.Picture:
                return new PictureFrame(source, id);
            case FrameClass.PlayCount:
                return new PlayCountFrame(source, id);
            case FrameClass.Popularimeter:
                return new PopularimeterFrame(source, id);
            case FrameClass.EventTiming:
                return new EventTimingFrame(source, [], id);
            default:
                return new UnknownFrame(id, source);
        }
    }

    /*
    **  v2.4 shaped header for a v2.2 frame, so every frame class reads
    **  the same layout
    */
    private static legacyHeader(id: FrameID, size: number): Buffer {
        const header = Buffer.alloc(HEADER_BYTE_SIZE);
        header.write(id.id, 0, 'latin1');
        encodeInt(size, 4, true).copy(header, 4);
        header[8] = LEGACY_STATUS_FLAGS;
        return header;
    }

    private unreadable(offset: number, reason: string): FrameReadResult {
        log.debug({ offset, version: this.version, reason }, 'frame is unreadable');
        const frame = new UnknownFrame();
        return { status: 'unreadable', frame, reason };
    }
}
