import { decodeText, encodeText, findTerminator, getTerminationCount, isAscii } from './byte-codec';
import { FrameClass, FrameEncoding } from './frame-classes';
import { DescriptiveOptions, SlashSeparatedFrames } from './frame-definitions';
import { Frame, FrameBytes } from './frame';
import { FrameID } from './frame-id';

const LANGUAGE_SIZE = 3;

function isDigits(value: string): boolean {
    return /^[0-9]*$/.test(value);
}

function stripTrailingNulls(text: string): string {
    return text.replace(/\0+$/, '');
}

/*
 **  Plain text frame (T***). Several values share one string, joined by
 **  '/' for some v2.3 frames and NUL everywhere else.
 */
export class TextFrame extends Frame {
    public readonly type: FrameClass = FrameClass.Text;

    protected text: string;

    constructor(id: FrameID, source: FrameBytes | string = '') {
        super(id, source instanceof FrameBytes ? source : undefined);
        this.text = source instanceof FrameBytes ? '' : source;
        if (new.target === TextFrame) {
            this.decode();
        }
    }

    public get content(): string {
        return this.text;
    }

    public set content(value: string) {
        if (this.canEdit()) {
            this.text = value;
            this.edited = true;
        }
    }

    /*
    **  The separate values, never an empty array
    */
    public get contents(): string[] {
        const values = this.splitValues();
        return values.length > 0 ? values : [''];
    }

    public set contents(values: string[]) {
        if (this.canEdit()) {
            this.text = values.filter(value => value !== '').join(this.separator());
            this.edited = true;
        }
    }

    public append(value: string): void {
        if (this.canEdit()) {
            this.text = this.text === '' ? value : this.text + this.separator() + value;
            this.edited = true;
        }
    }

    protected splitValues(): string[] {
        return this.text.split(this.separator()).filter(value => value !== '');
    }

    public separator(): string {
        return this.id3Version <= 3 && SlashSeparatedFrames.has(this.frameId.type) ? '/' : '\0';
    }

    public isEmpty(): boolean {
        return this.text === '';
    }

    /*
    **  Values are always written NUL separated
    */
    public write(): Buffer {
        const separator = this.separator();
        if (separator !== '\0') {
            this.text = this.text.split(separator).join('\0');
        }
        return super.write();
    }

    protected read(): void {
        const headerSize = this.headerSize();
        if (this.raw.length <= headerSize) {
            this.text = '';
            this.markInvalid('no room for the encoding byte');
            return;
        }
        this.text = stripTrailingNulls(decodeText(this.raw[headerSize], this.raw, headerSize + 1));
    }

    protected writeBody(): Buffer {
        const encoding = isAscii(this.text) ? FrameEncoding.Latin1 : FrameEncoding.UTF8;
        return Buffer.concat([Buffer.from([encoding]), encodeText(this.text, encoding)]);
    }

    protected sameContent(other: Frame): boolean {
        return other instanceof TextFrame && other.content === this.text;
    }

    protected describe(): Record<string, unknown> {
        return { content: this.text };
    }
}

/*
 **  Text frames that only hold whole numbers (TYER, TBPM, TLEN, ...).
 **  Anything with a non-digit is replaced by an empty string.
 */
export class NumericalTextFrame extends TextFrame {
    public readonly type: FrameClass = FrameClass.NumericalText;

    constructor(id: FrameID, source: FrameBytes | string | number = '') {
        super(id, typeof source === 'number' ? String(source) : source);
        if (!(source instanceof FrameBytes) && !isDigits(this.text)) {
            this.text = '';
        }
        this.decode();
    }

    public get content(): string {
        return this.text;
    }

    public set content(value: string) {
        if (this.canEdit()) {
            this.text = isDigits(value) ? value : '';
            this.edited = true;
        }
    }

    public get contents(): string[] {
        const values = this.splitValues();
        return values.length > 0 ? values : [''];
    }

    /*
    **  Values with a non-digit in them are dropped
    */
    public set contents(values: string[]) {
        if (this.canEdit()) {
            this.text = values.filter(value => value !== '' && isDigits(value)).join(this.separator());
            this.edited = true;
        }
    }

    /*
    **  First number in the frame, 0 when there is none
    */
    public get value(): number {
        const value = Number.parseInt(this.text, 10);
        return Number.isNaN(value) ? 0 : value;
    }

    public set value(value: number) {
        this.content = String(value);
    }

    public get values(): number[] {
        return this.splitValues().map(Number);
    }

    public setNumbers(values: number[]): void {
        this.contents = values.map(String);
    }

    public append(value: string | number): void {
        const text = String(value);
        if (isDigits(text)) {
            super.append(text);
        }
    }

    protected read(): void {
        super.read();
        if (!this.invalid) {
            const separator = this.separator();
            this.text = this.text.split(separator).filter(value => value !== '' && isDigits(value)).join(separator);
        }
    }

    protected sameContent(other: Frame): boolean {
        return other instanceof NumericalTextFrame && other.content === this.text;
    }

    protected describe(): Record<string, unknown> {
        return { content: this.text, value: this.value };
    }
}

export interface DescriptiveTextInit {
    content?: string;
    description?: string;
    language?: string;
}

/*
 **  Text with a description and/or language in front of it:
 **  COMM, USLT, USER, TXXX and WXXX
 */
export class DescriptiveTextFrame extends TextFrame {
    public readonly type: FrameClass = FrameClass.DescriptiveText;

    private textDescription: string;
    private textLanguage: string;

    constructor(id: FrameID, private readonly options: DescriptiveOptions, source: FrameBytes | DescriptiveTextInit = {}) {
        super(id, source instanceof FrameBytes ? source : source.content ?? '');
        this.textDescription = '';
        this.textLanguage = '';
        if (source instanceof FrameBytes) {
            this.decode();
            return;
        }
        if (!options.noDescription) {
            this.textDescription = source.description ?? '';
        }
        const language = source.language ?? '';
        if (options.language && language.length === LANGUAGE_SIZE) {
            this.textLanguage = language;
        }
    }

    public get description(): string {
        return this.textDescription;
    }

    public set description(value: string) {
        if (this.canEdit() && !this.options.noDescription) {
            this.textDescription = value;
            this.edited = true;
        }
    }

    /*
    **  Three letter code, empty when unset. Other lengths are rejected.
    */
    public get language(): string {
        return this.textLanguage;
    }

    public set language(value: string) {
        if (this.canEdit() && this.options.language) {
            this.textLanguage = value.length === LANGUAGE_SIZE ? value : '';
            this.edited = true;
        }
    }

    public hasLanguage(): boolean {
        return this.options.language;
    }

    public hasDescription(): boolean {
        return !this.options.noDescription;
    }

    public isLatin1Content(): boolean {
        return this.options.latin1Content;
    }

    protected read(): void {
        const headerSize = this.headerSize();
        this.text = '';
        this.textDescription = '';
        this.textLanguage = '';
        if (this.raw.length <= headerSize + (this.options.language ? 1 + LANGUAGE_SIZE : 1)) {
            this.markInvalid('too short for encoding and language');
            return;
        }

        const encoding = this.raw[headerSize];
        let descriptionStart = headerSize + 1;
        if (this.options.language) {
            this.textLanguage = decodeText(FrameEncoding.Latin1, this.raw, descriptionStart, descriptionStart + LANGUAGE_SIZE);
            descriptionStart += LANGUAGE_SIZE;
        }

        // A missing terminator means there is no description
        let contentStart = descriptionStart;
        if (!this.options.noDescription) {
            const descriptionEnd = findTerminator(this.raw, descriptionStart, encoding);
            if (descriptionEnd !== -1) {
                this.textDescription = decodeText(encoding, this.raw, descriptionStart, descriptionEnd);
                contentStart = descriptionEnd + getTerminationCount(encoding);
            }
        }

        const contentEncoding = this.options.latin1Content ? FrameEncoding.Latin1 : encoding;
        this.text = stripTrailingNulls(decodeText(contentEncoding, this.raw, contentStart));
    }

    protected writeBody(): Buffer {
        const parts: Buffer[] = [Buffer.from([FrameEncoding.UTF8])];
        if (this.options.language) {
            if (this.textLanguage.length !== LANGUAGE_SIZE) {
                this.textLanguage = 'xxx';
            }
            parts.push(encodeText(this.textLanguage, FrameEncoding.Latin1));
        }
        if (!this.options.noDescription) {
            parts.push(encodeText(this.textDescription, FrameEncoding.UTF8), Buffer.from([0x00]));
        }
        parts.push(encodeText(this.text, this.options.latin1Content ? FrameEncoding.Latin1 : FrameEncoding.UTF8));
        return Buffer.concat(parts);
    }

    protected sameContent(other: Frame): boolean {
        return other instanceof DescriptiveTextFrame &&
            other.content === this.text &&
            other.description === this.textDescription &&
            other.language === this.textLanguage;
    }

    protected describe(): Record<string, unknown> {
        return {
            content: this.text,
            description: this.textDescription,
            ...(this.options.language ? { language: this.textLanguage } : {}),
        };
    }
}

/*
 **  URL link frames (W***), Latin-1 with no encoding byte
 */
export class URLTextFrame extends TextFrame {
    public readonly type: FrameClass = FrameClass.URLText;

    constructor(id: FrameID, source: FrameBytes | string = '') {
        super(id, source);
        this.decode();
    }

    protected read(): void {
        const headerSize = this.headerSize();
        this.text = this.raw.length > headerSize
            ? stripTrailingNulls(decodeText(FrameEncoding.Latin1, this.raw, headerSize))
            : '';
    }

    protected writeBody(): Buffer {
        return encodeText(this.text, FrameEncoding.Latin1);
    }

    protected sameContent(other: Frame): boolean {
        return other instanceof URLTextFrame && other.content === this.text;
    }
}
