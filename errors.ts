/*
 **  Errors raised by the tag and file layer. Frame decoding never throws,
 **  a frame that cannot be decoded is flagged null instead.
 */
export enum Id3ErrorCode {
    FILE_NOT_FOUND = 'FILE_NOT_FOUND',
    NOT_MP3_FILE = 'NOT_MP3_FILE',
    FILE_FORMAT = 'FILE_FORMAT',
    TAG_SIZE = 'TAG_SIZE',
    WRITE_FAILED = 'WRITE_FAILED',
    INVALID_CONFIG = 'INVALID_CONFIG',
}

export class Id3Error extends Error {
    constructor(
        public readonly code: Id3ErrorCode,
        message: string,
    ) {
        super(message);
        this.name = 'Id3Error';
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, Id3Error);
        }
    }
}

export class FileNotFoundError extends Id3Error {
    constructor(public readonly path: string, cause?: unknown) {
        super(Id3ErrorCode.FILE_NOT_FOUND, `Could not open file: ${path}${describeCause(cause)}`);
        this.name = 'FileNotFoundError';
    }
}

/*
 **  Only .mp3, .mp4 and .tag files are accepted
 */
export class NotMp3FileError extends Id3Error {
    constructor(public readonly path: string) {
        super(Id3ErrorCode.NOT_MP3_FILE, `Not an MP3 file: ${path}`);
        this.name = 'NotMp3FileError';
    }
}

export class FileFormatError extends Id3Error {
    constructor(message: string) {
        super(Id3ErrorCode.FILE_FORMAT, message);
        this.name = 'FileFormatError';
    }
}

export class TagSizeError extends Id3Error {
    constructor(public readonly size: number) {
        super(Id3ErrorCode.TAG_SIZE, `Tag size ${size} exceeds the ID3v2 maximum`);
        this.name = 'TagSizeError';
    }
}

export class WriteError extends Id3Error {
    constructor(public readonly path: string, cause?: unknown) {
        super(Id3ErrorCode.WRITE_FAILED, `Could not write tag to ${path}${describeCause(cause)}`);
        this.name = 'WriteError';
    }
}

export class ConfigurationError extends Id3Error {
    constructor(message: string) {
        super(Id3ErrorCode.INVALID_CONFIG, message);
        this.name = 'ConfigurationError';
    }
}

function describeCause(cause: unknown): string {
    return cause instanceof Error ? ` (${cause.message})` : '';
}
