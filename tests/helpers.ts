import { encodeInt } from '../byte-codec';
import { FrameBytes } from '../frame';

/*
 **  Frame bytes: id, size (synchsafe from v2.4), two flag bytes, body
 */
export function frame(id: string, body: Buffer | number[], version = 4, flags: [number, number] = [0, 0]): Buffer {
    const data = Buffer.isBuffer(body) ? body : Buffer.from(body);
    return Buffer.concat([
        Buffer.from(id, 'latin1'),
        encodeInt(data.length, 4, version >= 4),
        Buffer.from(flags),
        data,
    ]);
}

/*
 **  ID3v2.2 frame: 3 byte id, 3 byte size, no flags
 */
export function legacyFrame(id: string, body: Buffer | number[]): Buffer {
    const data = Buffer.isBuffer(body) ? body : Buffer.from(body);
    return Buffer.concat([Buffer.from(id, 'latin1'), encodeInt(data.length, 3), data]);
}

export function frameBytes(id: string, body: Buffer | number[], version = 4, flags: [number, number] = [0, 0]): FrameBytes {
    return new FrameBytes(version, frame(id, body, version, flags));
}

/*
 **  Encoding byte followed by the text
 */
export function textBody(text: string, encoding = 0x00): Buffer {
    return Buffer.concat([Buffer.from([encoding]), Buffer.from(text, encoding === 0x03 ? 'utf8' : 'latin1')]);
}

/*
 **  A whole ID3v2 tag around the given frames
 */
export function tag(version: number, frames: Buffer[], padding = 0, flags = 0x00): Buffer {
    const body = Buffer.concat([...frames, Buffer.alloc(padding)]);
    return Buffer.concat([
        Buffer.from('ID3', 'latin1'),
        Buffer.from([version, 0x00, flags]),
        encodeInt(body.length, 4, true),
        body,
    ]);
}

/*
 **  128 byte ID3v1 block. A non-zero track makes it v1.1.
 */
export function id3v1(fields: { title?: string; artist?: string; album?: string; year?: string; comment?: string; track?: number; genre?: number }): Buffer {
    const block = Buffer.alloc(128);
    block.write('TAG', 0, 'latin1');
    block.write(fields.title ?? '', 3, 30, 'latin1');
    block.write(fields.artist ?? '', 33, 30, 'latin1');
    block.write(fields.album ?? '', 63, 30, 'latin1');
    block.write(fields.year ?? '', 93, 4, 'latin1');
    block.write(fields.comment ?? '', 97, fields.track ? 28 : 30, 'latin1');
    if (fields.track) {
        block[125] = 0x00;
        block[126] = fields.track;
    }
    block[127] = fields.genre ?? 0xFF;
    return block;
}

/*
 **  227 byte ID3v1-Extended block
 */
export function id3v1Extended(fields: { title?: string; genre?: string; startTime?: string; endTime?: string }): Buffer {
    const block = Buffer.alloc(227);
    block.write('TAG+', 0, 'latin1');
    block.write(fields.title ?? '', 4, 60, 'latin1');
    block.write(fields.genre ?? '', 185, 30, 'latin1');
    block.write(fields.startTime ?? '', 215, 6, 'latin1');
    block.write(fields.endTime ?? '', 221, 6, 'latin1');
    return block;
}
