import { Tag } from './tag';

export * from './byte-codec';
export * from './byte-source';
export * from './config';
export * from './errors';
export * from './event-timing-frame';
export * from './frame';
export * from './frame-classes';
export * from './frame-definitions';
export * from './frame-factory';
export * from './frame-id';
export * from './id3v1';
export { createLogger, logger } from './logger';
export * from './picture-frame';
export * from './play-count-frames';
export * from './tag';
export * from './text-frames';

/*
 **  Reads the tags of a file or buffer
 **  source => file path (.mp3, .mp4 or .tag) or Buffer
 */
export function read(source: string | Buffer): Tag {
    return typeof source === 'string' ? Tag.fromFile(source) : Tag.fromBuffer(source);
}
