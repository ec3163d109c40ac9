import { decodeText, encodeText, findTerminator, getTerminationCount } from './byte-codec';
import { FrameClass, FrameEncoding, Picture, PictureType, PictureTypeNames } from './frame-classes';
import { FrameType } from './frame-definitions';
import { Frame, FrameBytes } from './frame';
import { FrameID } from './frame-id';

const AllowedMIMETypes: ReadonlySet<string> = new Set(['png', 'jpeg', 'image/png', 'image/jpeg']);

/*
 **  ID3v2.2 PIC frames carry a 3 letter image format instead of a MIME type
 */
const LegacyImageFormats: ReadonlyMap<string, string> = new Map([
    ['PNG', 'image/png'],
    ['JPG', 'image/jpeg'],
]);

export function isAllowedMIMEType(mimeType: string): boolean {
    return AllowedMIMETypes.has(mimeType);
}

function toPictureType(value: number): PictureType {
    return value in PictureType ? value : PictureType.Other;
}

export interface PictureInit {
    data: Buffer;
    mimeType: string;
    description?: string;
    type?: PictureType;
}

/*
 **  Attached picture (APIC). The image itself is never looked at,
 **  only the MIME type has to be png or jpeg.
 */
export class PictureFrame extends Frame {
    public readonly type = FrameClass.Picture;

    private mime: string;
    private apicType: PictureType;
    private pictureDescription: string;
    private data: Buffer;

    constructor(source: FrameBytes | PictureInit, id: FrameID = new FrameID(FrameType.APIC)) {
        super(id, source instanceof FrameBytes ? source : undefined);
        this.mime = '';
        this.apicType = PictureType.Other;
        this.pictureDescription = '';
        this.data = Buffer.alloc(0);

        if (source instanceof FrameBytes) {
            this.decode();
            return;
        }
        this.mime = source.mimeType;
        this.apicType = source.type ?? PictureType.FrontCover;
        this.pictureDescription = source.description ?? '';
        this.data = source.data;
        if (!isAllowedMIMEType(this.mime)) {
            this.invalid = true;
        }
    }

    public get mimeType(): string {
        return this.mime;
    }

    public get pictureType(): PictureType {
        return this.apicType;
    }

    public set pictureType(value: PictureType) {
        if (this.canEdit()) {
            this.apicType = value;
            this.edited = true;
        }
    }

    public get description(): string {
        return this.pictureDescription;
    }

    public set description(value: string) {
        if (this.canEdit()) {
            this.pictureDescription = value;
            this.edited = true;
        }
    }

    public get picture(): Buffer {
        return this.data;
    }

    /*
    **  Replaces the image. The frame turns null if the MIME type isn't allowed.
    */
    public setPicture(data: Buffer, mimeType: string): void {
        if (this.canEdit()) {
            this.data = data;
            this.mime = mimeType;
            this.invalid = !isAllowedMIMEType(mimeType);
            this.edited = true;
        }
    }

    public toPicture(): Picture {
        return {
            data: this.data,
            mimeType: this.mime,
            description: this.pictureDescription,
            type: this.apicType,
        };
    }

    public isEmpty(): boolean {
        return this.data.length === 0;
    }

    protected read(): void {
        const headerSize = this.headerSize();
        this.mime = '';
        this.apicType = PictureType.Other;
        this.pictureDescription = '';
        this.data = Buffer.alloc(0);
        if (this.raw.length <= headerSize) {
            this.markInvalid('no room for the encoding byte');
            return;
        }

        const encoding = this.raw[headerSize];
        let typeOffset: number;
        if (this.id3Version < 3) {
            const format = decodeText(FrameEncoding.Latin1, this.raw, headerSize + 1, headerSize + 4);
            this.mime = LegacyImageFormats.get(format.toUpperCase()) ?? format;
            typeOffset = headerSize + 4;
        } else {
            const mimeEnd = findTerminator(this.raw, headerSize + 1, FrameEncoding.Latin1);
            if (mimeEnd === -1) {
                this.markInvalid('MIME type is not terminated');
                return;
            }
            this.mime = decodeText(FrameEncoding.Latin1, this.raw, headerSize + 1, mimeEnd);
            typeOffset = mimeEnd + 1;
        }

        if (!isAllowedMIMEType(this.mime)) {
            this.markInvalid(`MIME type "${this.mime}" is not allowed`);
            return;
        }
        if (typeOffset >= this.raw.length) {
            this.markInvalid('picture type is missing');
            return;
        }
        this.apicType = toPictureType(this.raw[typeOffset]);

        const descriptionStart = typeOffset + 1;
        const descriptionEnd = findTerminator(this.raw, descriptionStart, encoding);
        if (descriptionEnd === -1) {
            this.markInvalid('description is not terminated');
            return;
        }
        this.pictureDescription = decodeText(encoding, this.raw, descriptionStart, descriptionEnd);
        this.data = Buffer.from(this.raw.subarray(descriptionEnd + getTerminationCount(encoding)));
    }

    protected writeBody(): Buffer {
        return Buffer.concat([
            Buffer.from([FrameEncoding.UTF8]),
            encodeText(this.mime, FrameEncoding.Latin1),
            Buffer.from([0x00, this.apicType]),
            encodeText(this.pictureDescription, FrameEncoding.UTF8),
            Buffer.from([0x00]),
            this.data,
        ]);
    }

    protected sameContent(other: Frame): boolean {
        return other instanceof PictureFrame &&
            other.mimeType === this.mime &&
            other.picture.equals(this.data);
    }

    protected describe(): Record<string, unknown> {
        return {
            mimeType: this.mime,
            pictureType: PictureTypeNames[this.apicType],
            description: this.pictureDescription,
            size: this.data.length,
        };
    }
}
