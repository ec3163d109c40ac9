import { decodeBigInt, decodeText, encodeInt, encodeText, findTerminator } from './byte-codec';
import { FrameClass, FrameEncoding } from './frame-classes';
import { FrameType } from './frame-definitions';
import { Frame, FrameBytes } from './frame';
import { FrameID } from './frame-id';

/*
 **  The counter takes at least 4 bytes on file and grows when it must
 */
const MIN_COUNTER_SIZE = 4;

function encodeCounter(count: bigint): Buffer {
    return encodeInt(count, count >= 1n << 32n ? 0 : MIN_COUNTER_SIZE, false);
}

/*
 **  Fractions are truncated, negative and non-finite counts become 0
 */
export function toPlayCount(value: number | bigint): bigint {
    if (typeof value === 'bigint') {
        return value < 0n ? 0n : value;
    }
    return Number.isFinite(value) && value > 0 ? BigInt(Math.trunc(value)) : 0n;
}

/*
 **  POPM rating byte => stars.
 **  0 => 0, 1-31 => 1, 32-95 => 2, 96-159 => 3, 160-223 => 4, 224-255 => 5
 */
export function ratingFromByte(byte: number): number {
    if (byte === 0) {
        return 0;
    } else if (byte <= 31) {
        return 1;
    } else if (byte <= 95) {
        return 2;
    } else if (byte <= 159) {
        return 3;
    } else if (byte <= 223) {
        return 4;
    }
    return 5;
}

export function ratingToByte(stars: number): number {
    switch (stars) {
        case 5:
            return 255;
        case 4:
            return 196;
        case 3:
            return 128;
        case 2:
            return 64;
        case 1:
            return 1;
        default:
            return 0;
    }
}

/*
 **  Play counter (PCNT). A count of 0 is still a count, so this frame is
 **  never empty.
 */
export class PlayCountFrame extends Frame {
    public readonly type: FrameClass = FrameClass.PlayCount;

    protected count: bigint;

    constructor(source: FrameBytes | number | bigint = 0n, id: FrameID = new FrameID(FrameType.PCNT)) {
        super(id, source instanceof FrameBytes ? source : undefined);
        this.count = source instanceof FrameBytes ? 0n : toPlayCount(source);
        if (new.target === PlayCountFrame) {
            this.decode();
        }
    }

    public get playCount(): bigint {
        return this.count;
    }

    public set playCount(value: bigint) {
        if (this.canEdit()) {
            this.count = toPlayCount(value);
            this.edited = true;
        }
    }

    public isEmpty(): boolean {
        return false;
    }

    protected read(): void {
        const headerSize = this.headerSize();
        if (this.raw.length <= headerSize) {
            this.count = 0n;
            this.markInvalid('no counter bytes');
            return;
        }
        this.count = decodeBigInt(this.raw.subarray(headerSize));
    }

    protected writeBody(): Buffer {
        return encodeCounter(this.count);
    }

    protected sameContent(other: Frame): boolean {
        return other instanceof PlayCountFrame && other.playCount === this.count;
    }

    protected describe(): Record<string, unknown> {
        return { playCount: this.count.toString() };
    }
}

export interface PopularimeterInit {
    playCount?: number | bigint;
    rating?: number;
    email?: string;
}

/*
 **  Popularimeter (POPM): email of the user, a 0-5 star rating and an
 **  optional play counter
 */
export class PopularimeterFrame extends PlayCountFrame {
    public readonly type: FrameClass = FrameClass.Popularimeter;

    private stars: number;
    private emailAddress: string;

    constructor(source: FrameBytes | PopularimeterInit = {}, id: FrameID = new FrameID(FrameType.POPM)) {
        super(source instanceof FrameBytes ? source : source.playCount ?? 0n, id);
        this.stars = 0;
        this.emailAddress = '';
        if (source instanceof FrameBytes) {
            this.decode();
            return;
        }
        this.stars = PopularimeterFrame.toStars(source.rating ?? 0);
        this.emailAddress = source.email ?? '';
    }

    /*
    **  0 when unrated, otherwise 1-5
    */
    public get rating(): number {
        return this.stars;
    }

    /*
    **  0-5 is taken as stars, anything above as a POPM rating byte
    */
    public set rating(value: number) {
        if (this.canEdit()) {
            this.stars = PopularimeterFrame.toStars(value);
            this.edited = true;
        }
    }

    public get email(): string {
        return this.emailAddress;
    }

    public set email(value: string) {
        if (this.canEdit()) {
            this.emailAddress = value;
            this.edited = true;
        }
    }

    public isEmpty(): boolean {
        return this.count === 0n && this.stars === 0 && this.emailAddress === '';
    }

    protected read(): void {
        const headerSize = this.headerSize();
        this.emailAddress = '';
        this.stars = 0;
        this.count = 0n;

        const emailEnd = findTerminator(this.raw, headerSize, FrameEncoding.Latin1);
        if (emailEnd === -1 || emailEnd + 1 >= this.raw.length) {
            this.markInvalid('email or rating missing');
            return;
        }
        this.emailAddress = decodeText(FrameEncoding.Latin1, this.raw, headerSize, emailEnd);
        this.stars = ratingFromByte(this.raw[emailEnd + 1]);
        this.count = decodeBigInt(this.raw.subarray(emailEnd + 2));
    }

    protected writeBody(): Buffer {
        return Buffer.concat([
            encodeText(this.emailAddress, FrameEncoding.Latin1),
            Buffer.from([0x00, ratingToByte(this.stars)]),
            encodeCounter(this.count),
        ]);
    }

    protected sameContent(other: Frame): boolean {
        return other instanceof PopularimeterFrame &&
            other.playCount === this.count &&
            other.rating === this.stars &&
            other.email === this.emailAddress;
    }

    protected describe(): Record<string, unknown> {
        return {
            playCount: this.count.toString(),
            rating: this.stars,
            email: this.emailAddress,
        };
    }

    private static toStars(value: number): number {
        const byte = Number.isFinite(value) ? Math.min(255, Math.max(0, Math.trunc(value))) : 0;
        return byte <= 5 ? byte : ratingFromByte(byte);
    }
}
