import { decodeInt, encodeInt } from './byte-codec';
import { FrameClass, TimeStampFormat, TimingCode } from './frame-classes';
import { FrameType } from './frame-definitions';
import { Frame, FrameBytes } from './frame';
import { FrameID } from './frame-id';

const TIME_BYTE_LENGTH = 4;

/*
 **  0x17-0xDF and 0xF0-0xFC are reserved for future use, 0xFF means
 **  "one more byte of events follows" which isn't supported
 */
export function isReservedTimingCode(code: number): boolean {
    return (code >= 0x17 && code <= 0xDF) || (code >= 0xF0 && code <= 0xFC) || code === 0xFF || code < 0 || code > 0xFF;
}

function isTimeStampFormat(value: number): value is TimeStampFormat {
    return value === TimeStampFormat.MPEGFrames || value === TimeStampFormat.Milliseconds;
}

/*
 **  Event timing codes (ETCO): when the intro, verses, refrains and so on
 **  start, in milliseconds or MPEG frames
 */
export class EventTimingFrame extends Frame {
    public readonly type = FrameClass.EventTiming;

    private timeStampFormat: TimeStampFormat;
    private readonly events = new Map<TimingCode, number>();

    constructor(
        source: FrameBytes | TimeStampFormat = TimeStampFormat.Milliseconds,
        entries: Iterable<readonly [TimingCode, number]> = [],
        id: FrameID = new FrameID(FrameType.ETCO),
    ) {
        super(id, source instanceof FrameBytes ? source : undefined);
        this.timeStampFormat = TimeStampFormat.Milliseconds;
        if (source instanceof FrameBytes) {
            this.decode();
            return;
        }
        if (!isTimeStampFormat(source)) {
            this.markInvalid(`unknown time stamp format ${source}`);
            return;
        }
        this.timeStampFormat = source;
        for (const [code, time] of entries) {
            if (!isReservedTimingCode(code)) {
                this.events.set(code, EventTimingFrame.toTime(time));
            }
        }
    }

    public get format(): TimeStampFormat {
        return this.timeStampFormat;
    }

    public isMilliseconds(): boolean {
        return this.timeStampFormat === TimeStampFormat.Milliseconds;
    }

    /*
    **  Time of the event, 0 when it isn't set
    */
    public value(code: TimingCode): number {
        return this.events.get(code) ?? 0;
    }

    public has(code: TimingCode): boolean {
        return this.events.has(code);
    }

    /*
    **  Reserved codes are ignored. Times are clamped to 32 bits.
    */
    public setValue(code: TimingCode, time: number): void {
        if (this.canEdit() && !isReservedTimingCode(code)) {
            this.events.set(code, EventTimingFrame.toTime(time));
            this.edited = true;
        }
    }

    public remove(code: TimingCode): void {
        if (this.canEdit() && this.events.delete(code)) {
            this.edited = true;
        }
    }

    /*
    **  Drops every event, optionally switching to another time stamp format.
    **  An unknown format leaves the frame as it is.
    */
    public clear(format: TimeStampFormat = this.timeStampFormat): void {
        if (this.canEdit() && isTimeStampFormat(format)) {
            this.events.clear();
            this.timeStampFormat = format;
            this.edited = true;
        }
    }

    public codes(): TimingCode[] {
        return [...this.events.keys()];
    }

    public isEmpty(): boolean {
        return this.events.size === 0;
    }

    protected read(): void {
        const headerSize = this.headerSize();
        this.events.clear();
        if (this.raw.length <= headerSize) {
            this.markInvalid('no time stamp format');
            return;
        }

        const format = this.raw[headerSize];
        if (!isTimeStampFormat(format)) {
            this.markInvalid(`unknown time stamp format ${format}`);
            return;
        }
        this.timeStampFormat = format;

        for (let i = headerSize + 1; i + TIME_BYTE_LENGTH < this.raw.length; i += 1 + TIME_BYTE_LENGTH) {
            const code = this.raw[i];
            if (!isReservedTimingCode(code)) {
                this.events.set(code, decodeInt(this.raw.subarray(i + 1, i + 1 + TIME_BYTE_LENGTH)));
            }
        }
    }

    /*
    **  Events are written in chronological order
    */
    protected writeBody(): Buffer {
        const events = [...this.events.entries()].sort(([codeA, timeA], [codeB, timeB]) => timeA - timeB || codeA - codeB);
        return Buffer.concat([
            Buffer.from([this.timeStampFormat]),
            ...events.map(([code, time]) => Buffer.concat([Buffer.from([code]), encodeInt(time, TIME_BYTE_LENGTH)])),
        ]);
    }

    protected sameContent(other: Frame): boolean {
        if (!(other instanceof EventTimingFrame) || other.format !== this.timeStampFormat) {
            return false;
        }
        const codes = other.codes();
        return codes.length === this.events.size &&
            codes.every(code => this.events.get(code) === other.value(code));
    }

    protected describe(): Record<string, unknown> {
        return {
            format: this.isMilliseconds() ? 'milliseconds' : 'mpeg-frames',
            events: Object.fromEntries([...this.events.entries()].map(([code, time]) => [TimingCode[code] ?? code, time])),
        };
    }

    private static toTime(time: number): number {
        if (!Number.isFinite(time) || time <= 0) {
            return 0;
        }
        return Math.min(Math.trunc(time), 0xFFFFFFFF);
    }
}
