import * as fs from 'fs';
import { createLogger } from './logger';

const log = createLogger('byte-source');

/*
 **  Random access to the bytes of a tag. read() gives null when the range
 **  can't be read in full.
 */
export interface ByteSource {
    read(position: number, length: number): Buffer | null;
    size(): number;
}

export class BufferSource implements ByteSource {
    constructor(private readonly buffer: Buffer) {}

    public read(position: number, length: number): Buffer | null {
        if (position < 0 || length < 0 || position + length > this.buffer.length) {
            return null;
        }
        return this.buffer.subarray(position, position + length);
    }

    public size(): number {
        return this.buffer.length;
    }
}

/*
 **  Reads straight from an open file descriptor, owned by the caller
 */
export class FileSource implements ByteSource {
    constructor(private readonly fd: number, private readonly path = '') {}

    public read(position: number, length: number): Buffer | null {
        if (position < 0 || length < 0) {
            return null;
        }
        const buffer = Buffer.alloc(length);
        try {
            const bytesRead = fs.readSync(this.fd, buffer, 0, length, position);
            if (bytesRead !== length) {
                log.warn({ path: this.path, position, length, bytesRead }, 'short read');
                return null;
            }
        } catch (err) {
            log.warn({ path: this.path, position, length, err }, 'read failed');
            return null;
        }
        return buffer;
    }

    public size(): number {
        try {
            return fs.fstatSync(this.fd).size;
        } catch (err) {
            log.warn({ path: this.path, err }, 'stat failed');
            return 0;
        }
    }
}
