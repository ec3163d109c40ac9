import { encodeInt, removeUnsynchronisation } from './byte-codec';
import { FrameClass, FrameFlag, FrameSummary } from './frame-classes';
import { WRITE_VERSION } from './frame-definitions';
import { FrameID } from './frame-id';
import { createLogger } from './logger';

const log = createLogger('frame');

/*
 **  ID + size + two flag bytes
 */
export const HEADER_BYTE_SIZE = 10;

interface FlagBit {
    byte: 8 | 9;
    v3: number;
    v4: number;
}

/*
 **  Same flag, different bit depending on the version.
 **  A zero mask means the flag doesn't exist in that version.
 */
const FlagBits: Readonly<Record<FrameFlag, FlagBit>> = {
    [FrameFlag.DiscardForTagAlter]:  { byte: 8, v3: 0x80, v4: 0x40 },
    [FrameFlag.DiscardForFileAlter]: { byte: 8, v3: 0x40, v4: 0x20 },
    [FrameFlag.ReadOnly]:            { byte: 8, v3: 0x20, v4: 0x10 },
    [FrameFlag.Compressed]:          { byte: 9, v3: 0x80, v4: 0x08 },
    [FrameFlag.Encrypted]:           { byte: 9, v3: 0x40, v4: 0x04 },
    [FrameFlag.GroupingIdentity]:    { byte: 9, v3: 0x20, v4: 0x40 },
    [FrameFlag.Unsynchronised]:      { byte: 9, v3: 0x00, v4: 0x02 },
    [FrameFlag.DataLengthIndicator]: { byte: 9, v3: 0x00, v4: 0x01 },
};

export function flagMask(frameFlag: FrameFlag, version: number): number {
    const bit = FlagBits[frameFlag];
    return version === 3 ? bit.v3 : bit.v4;
}

/*
 **  Bytes of a frame as found in a tag, header included, and the major
 **  version of the tag they came from.
 */
export class FrameBytes {
    constructor(
        public readonly version: number,
        public readonly bytes: Buffer,
    ) {}
}

export abstract class Frame {
    public abstract readonly type: FrameClass;

    protected raw: Buffer;
    protected id3Version: number;
    protected invalid: boolean;
    protected edited = false;
    private readonly fromFile: boolean;

    /*
    **  source  => bytes read from a tag, or nothing for a frame built in memory.
    **  Concrete classes decode the bytes at the end of their own constructor.
    */
    protected constructor(protected readonly frameId: FrameID, source?: FrameBytes) {
        if (source === undefined) {
            this.raw = Buffer.alloc(0);
            this.id3Version = WRITE_VERSION;
            this.invalid = frameId.isUnknown();
            this.fromFile = false;
            return;
        }

        this.raw = source.bytes;
        this.id3Version = source.version;
        this.fromFile = true;
        this.invalid = this.structurallyInvalid();
        if (!this.invalid && this.flag(FrameFlag.Unsynchronised)) {
            this.raw = removeUnsynchronisation(this.raw, HEADER_BYTE_SIZE);
        }
    }

    public get id(): FrameID {
        return this.frameId;
    }

    public get version(): number {
        return this.id3Version;
    }

    public isNull(): boolean {
        return this.invalid;
    }

    public isEdited(): boolean {
        return this.edited;
    }

    public isFromFile(): boolean {
        return this.fromFile;
    }

    public abstract isEmpty(): boolean;

    public flag(frameFlag: FrameFlag): boolean {
        if (this.raw.length < HEADER_BYTE_SIZE) {
            return false;
        }
        const mask = flagMask(frameFlag, this.id3Version);
        return mask !== 0 && (this.raw[FlagBits[frameFlag].byte] & mask) !== 0;
    }

    public headerSize(): number {
        return HEADER_BYTE_SIZE +
            (this.flag(FrameFlag.Compressed) ? 4 : 0) +
            (this.flag(FrameFlag.Encrypted) ? 1 : 0) +
            (this.flag(FrameFlag.GroupingIdentity) ? 1 : 0) +
            (this.flag(FrameFlag.DataLengthIndicator) ? 4 : 0);
    }

    /*
    **  The group this frame belongs to, 0 when it isn't grouped.
    **  v2.3 keeps the group byte last in the header, v2.4 first.
    */
    public groupIdentity(): number {
        const headerSize = this.headerSize();
        if (!this.flag(FrameFlag.GroupingIdentity) || this.raw.length < headerSize) {
            return 0;
        }
        return this.id3Version === 3 ? this.raw[headerSize - 1] : this.raw[HEADER_BYTE_SIZE];
    }

    /*
    **  Frames built in memory have no bytes until write() is called
    */
    public bytes(includeHeader = true): Buffer {
        if (includeHeader) {
            return this.raw;
        }
        const headerSize = this.headerSize();
        return this.raw.length < headerSize ? Buffer.alloc(0) : this.raw.subarray(headerSize);
    }

    public size(includeHeader = false): number {
        if (includeHeader) {
            return this.raw.length;
        }
        const headerSize = this.headerSize();
        return this.raw.length < headerSize ? 0 : this.raw.length - headerSize;
    }

    /*
    **  Re-encodes the frame as ID3v2.4. Null and empty frames give an empty
    **  buffer. Only the read-only flag survives.
    */
    public write(): Buffer {
        const readOnly = this.flag(FrameFlag.ReadOnly);
        this.id3Version = WRITE_VERSION;
        this.edited = false;

        if (this.invalid || this.isEmpty()) {
            this.raw = Buffer.alloc(0);
            return this.raw;
        }

        const body = this.writeBody();
        const header = Buffer.alloc(HEADER_BYTE_SIZE);
        header.write(this.frameId.id, 0, 'latin1');
        encodeInt(body.length, 4, true).copy(header, 4);
        header[8] = readOnly ? flagMask(FrameFlag.ReadOnly, WRITE_VERSION) : 0x00;
        this.raw = Buffer.concat([header, body]);
        return this.raw;
    }

    /*
    **  Throws away edits and decodes the stored bytes again.
    **  A frame built in memory and never written has nothing to go back to.
    */
    public revert(): void {
        if (this.raw.length === 0) {
            return;
        }
        this.invalid = this.structurallyInvalid();
        this.decode();
        this.edited = false;
    }

    public equals(other: Frame): boolean {
        if (other.type !== this.type || !other.id.equals(this.frameId) || other.isNull() !== this.invalid) {
            return false;
        }
        return this.invalid || this.sameContent(other);
    }

    public toJSON(): FrameSummary {
        return {
            id: this.frameId.id,
            type: this.type,
            null: this.invalid,
            ...(this.invalid ? {} : this.describe()),
        };
    }

    /*
    **  Decodes this.raw into the typed fields, or flags the frame null
    */
    protected abstract read(): void;

    protected abstract writeBody(): Buffer;

    protected abstract sameContent(other: Frame): boolean;

    protected abstract describe(): Record<string, unknown>;

    protected decode(): void {
        if (!this.invalid && this.raw.length > 0) {
            this.read();
        }
    }

    protected canEdit(): boolean {
        return !this.flag(FrameFlag.ReadOnly);
    }

    protected markInvalid(reason: string): void {
        this.invalid = true;
        log.debug({ frame: this.frameId.id, version: this.id3Version, reason }, 'frame could not be decoded');
    }

    private structurallyInvalid(): boolean {
        return this.raw.length <= HEADER_BYTE_SIZE ||
            this.flag(FrameFlag.Compressed) ||
            this.flag(FrameFlag.Encrypted);
    }
}

/*
 **  Any frame this library can't decode, kept as raw bytes
 */
export class UnknownFrame extends Frame {
    public readonly type = FrameClass.Unknown;

    constructor(id: FrameID = new FrameID(''), source?: FrameBytes) {
        super(id, source);
    }

    public isEmpty(): boolean {
        return this.raw.length <= HEADER_BYTE_SIZE;
    }

    /*
    **  No typed fields to rebuild from. Frames asking to be dropped when the
    **  tag changes are cleared, the others keep their payload and get a
    **  synchsafe size and v2.4 flag bits. Unsynchronisation was already
    **  undone on read so its flag is dropped.
    */
    public write(): Buffer {
        const discard = this.flag(FrameFlag.DiscardForTagAlter);
        const kept = Object.values(FrameFlag).filter(frameFlag =>
            frameFlag !== FrameFlag.Unsynchronised && this.flag(frameFlag));
        this.id3Version = WRITE_VERSION;
        this.edited = false;

        if (discard || this.invalid || this.isEmpty()) {
            this.raw = Buffer.alloc(0);
            this.invalid = true;
            return this.raw;
        }

        const raw = Buffer.from(this.raw);
        encodeInt(raw.length - HEADER_BYTE_SIZE, 4, true).copy(raw, 4);
        raw[8] = 0x00;
        raw[9] = 0x00;
        for (const frameFlag of kept) {
            raw[FlagBits[frameFlag].byte] |= flagMask(frameFlag, WRITE_VERSION);
        }
        this.raw = raw;
        return this.raw;
    }

    protected read(): void {}

    protected writeBody(): Buffer {
        return this.bytes(false);
    }

    protected sameContent(other: Frame): boolean {
        return this.raw.equals(other.bytes());
    }

    protected describe(): Record<string, unknown> {
        return { size: this.raw.length };
    }
}
