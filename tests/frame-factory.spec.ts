import { encodeInt } from '../byte-codec';
import { BufferSource } from '../byte-source';
import { EventTimingFrame } from '../event-timing-frame';
import { FrameClass, FrameFlag, TimeStampFormat } from '../frame-classes';
import { FrameType } from '../frame-definitions';
import { UnknownFrame } from '../frame';
import { FrameFactory, classifyFrame } from '../frame-factory';
import { FrameID } from '../frame-id';
import { PictureFrame } from '../picture-frame';
import { PlayCountFrame } from '../play-count-frames';
import { DescriptiveTextFrame, NumericalTextFrame, TextFrame } from '../text-frames';
import { frame, legacyFrame, tag, textBody } from './helpers';

function factoryFor(data: Buffer, version: number): FrameFactory {
    return new FrameFactory(new BufferSource(data), version, data.length);
}

describe('FrameFactory', () => {
    describe('read', () => {
        it('should parse a frame inside the tag', () => {
            const data = tag(4, [frame('TIT2', textBody('Hello'))]);
            const result = factoryFor(data, 4).read(10);
            expect(result.status).toBe('parsed');
            if (result.status === 'unreadable') {
                return;
            }
            expect(result.size).toBe(16);
            expect(result.id.type).toBe(FrameType.TIT2);
            expect(result.frame).toBeInstanceOf(TextFrame);
            expect(result.frame instanceof TextFrame && result.frame.content).toBe('Hello');
        });

        it('should refuse a frame that runs past the end of the tag', () => {
            const overrun = Buffer.concat([
                Buffer.from('TIT2', 'latin1'),
                encodeInt(100, 4, true),
                Buffer.from([0x00, 0x00]),
                textBody('Hello'),
            ]);
            const data = tag(4, [overrun]);
            const result = factoryFor(data, 4).read(10);
            expect(result.status).toBe('unreadable');
            expect(result.frame.isNull()).toBe(true);
            if (result.status === 'unreadable') {
                expect(result.reason).toBe('frame TIT2 of 100 bytes runs past the end of the tag');
            }
        });

        it('should stop at padding', () => {
            const data = tag(4, [frame('TIT2', textBody('Hello'))], 20);
            const result = factoryFor(data, 4).read(26);
            expect(result.status).toBe('unreadable');
            if (result.status === 'unreadable') {
                expect(result.reason).toBe('zero frame size');
            }
        });

        it('should refuse a header that does not fit', () => {
            const data = tag(4, [frame('TIT2', textBody('Hello'))]);
            const result = factoryFor(data, 4).read(20);
            expect(result.status).toBe('unreadable');
        });

        it('should need a byte source', () => {
            expect(new FrameFactory().read(0).status).toBe('unreadable');
        });

        it('should report frames it could not decode as invalid', () => {
            const data = tag(4, [frame('TIT2', textBody('x'), 4, [0x00, 0x08])]);
            const result = factoryFor(data, 4).read(10);
            expect(result.status).toBe('invalid');
            expect(result.frame.isNull()).toBe(true);
        });

        it('should convert ID3v2.2 frames', () => {
            const data = tag(2, [legacyFrame('TT2', textBody('Old'))]);
            const result = factoryFor(data, 2).read(10);
            expect(result.status).toBe('parsed');
            if (result.status === 'unreadable') {
                return;
            }
            expect(result.size).toBe(10);
            expect(result.frame.id.id).toBe('TIT2');
            expect(result.frame.flag(FrameFlag.DiscardForTagAlter)).toBe(true);
            expect(result.frame instanceof TextFrame && result.frame.content).toBe('Old');
        });

        it('should keep frames with unknown ids as raw bytes', () => {
            const data = tag(4, [frame('PRIV', [0x01, 0x02])]);
            const result = factoryFor(data, 4).read(10);
            expect(result.status).toBe('parsed');
            expect(result.frame).toBeInstanceOf(UnknownFrame);
            expect(result.frame.size()).toBe(2);
        });
    });

    describe('create', () => {
        const factory = new FrameFactory();

        it('should read from the source when given an offset', () => {
            const data = tag(3, [frame('TALB', textBody('Album'), 3)]);
            const created = factoryFor(data, 3).create(10);
            expect(created instanceof TextFrame && created.content).toBe('Album');
        });

        it('should return the id with the frame', () => {
            const data = tag(3, [frame('TPE1', textBody('Artist'), 3)]);
            const [id, created] = factoryFor(data, 3).createPair(10);
            expect(id.type).toBe(FrameType.TPE1);
            expect(created.isNull()).toBe(false);
        });

        it('should build text frames from aliases', () => {
            const created = factory.create('title', 'Song');
            expect(created).toBeInstanceOf(TextFrame);
            expect(created.id.id).toBe('TIT2');
            expect(created instanceof TextFrame && created.content).toBe('Song');
        });

        it('should build descriptive frames', () => {
            const created = factory.create('COMM', 'hi', 'd', 'eng');
            expect(created).toBeInstanceOf(DescriptiveTextFrame);
            if (created instanceof DescriptiveTextFrame) {
                expect(created.content).toBe('hi');
                expect(created.description).toBe('d');
                expect(created.language).toBe('eng');
            }
        });

        it('should parse play counts from the text', () => {
            const counted = factory.create('PCNT', '12');
            expect(counted instanceof PlayCountFrame && counted.playCount).toBe(12n);
            const invalid = factory.create('PCNT', 'twelve');
            expect(invalid instanceof PlayCountFrame && invalid.playCount).toBe(0n);
        });

        it('should build a picture frame that stays null until it has data', () => {
            const created = factory.create('APIC');
            expect(created).toBeInstanceOf(PictureFrame);
            expect(created.isNull()).toBe(true);
        });

        it('should build an event timing frame in milliseconds', () => {
            const created = factory.create('ETCO');
            expect(created).toBeInstanceOf(EventTimingFrame);
            expect(created instanceof EventTimingFrame && created.format).toBe(TimeStampFormat.Milliseconds);
        });

        it('should give a null frame for unknown ids', () => {
            const created = factory.create('ZZZZ', 'x');
            expect(created).toBeInstanceOf(UnknownFrame);
            expect(created.isNull()).toBe(true);
        });

        it('should join several values', () => {
            const created = factory.createTexts('TPE1', ['A', 'B']);
            expect(created instanceof TextFrame && created.content).toBe('A\0B');
        });

        it('should only accept whole non-negative numbers', () => {
            const year = factory.createNumber('TYER', 1999);
            expect(year).toBeInstanceOf(NumericalTextFrame);
            expect(year instanceof NumericalTextFrame && year.value).toBe(1999);
            expect(factory.createNumber('TYER', -1).isEmpty()).toBe(true);
            expect(factory.createNumber('TYER', 1.5).isEmpty()).toBe(true);
        });
    });
});

describe('classifyFrame', () => {
    it('should pick the class from the id', () => {
        const classes = ['TXXX', 'TBPM', 'TIT2', 'WOAR', 'WXXX', 'APIC', 'AENC', 'PCNT', 'POPM', 'ETCO', 'PRIV', 'ZZZZ']
            .map(id => classifyFrame(new FrameID(id)));
        expect(classes).toEqual([
            FrameClass.DescriptiveText,
            FrameClass.NumericalText,
            FrameClass.Text,
            FrameClass.URLText,
            FrameClass.DescriptiveText,
            FrameClass.Picture,
            FrameClass.Unknown,
            FrameClass.PlayCount,
            FrameClass.Popularimeter,
            FrameClass.EventTiming,
            FrameClass.Unknown,
            FrameClass.Unknown,
        ]);
    });
});
