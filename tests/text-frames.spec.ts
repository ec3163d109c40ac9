import { FrameClass, FrameFlag } from '../frame-classes';
import { DescriptiveFrames, FrameType } from '../frame-definitions';
import { FrameBytes, UnknownFrame } from '../frame';
import { FrameID } from '../frame-id';
import { DescriptiveTextFrame, NumericalTextFrame, TextFrame, URLTextFrame } from '../text-frames';
import { frameBytes, textBody } from './helpers';

function descriptiveOptions(type: FrameType) {
    const options = DescriptiveFrames.get(type);
    if (options === undefined) {
        throw new Error(`${type} is not descriptive`);
    }
    return options;
}

describe('TextFrame', () => {
    it('should decode Latin-1 text', () => {
        const frame = new TextFrame(new FrameID('TIT2'), frameBytes('TIT2', textBody('Hello')));
        expect(frame.type).toBe(FrameClass.Text);
        expect(frame.content).toBe('Hello');
        expect(frame.isNull()).toBe(false);
        expect(frame.isEmpty()).toBe(false);
        expect(frame.isFromFile()).toBe(true);
    });

    it('should be null without an encoding byte', () => {
        const frame = new TextFrame(new FrameID('TIT2'), frameBytes('TIT2', []));
        expect(frame.isNull()).toBe(true);
        expect(frame.content).toBe('');
    });

    it('should strip trailing NULs', () => {
        const frame = new TextFrame(new FrameID('TALB'), frameBytes('TALB', textBody('Album\0\0')));
        expect(frame.content).toBe('Album');
    });

    it('should split v2.3 values on slashes and write them NUL separated', () => {
        const frame = new TextFrame(new FrameID('TPE1', 3), frameBytes('TPE1', textBody('A/B'), 3));
        expect(frame.contents).toEqual(['A', 'B']);

        const written = frame.write();
        expect(frame.version).toBe(4);
        expect([...written]).toEqual([
            0x54, 0x50, 0x45, 0x31, 0x00, 0x00, 0x00, 0x04, 0x00, 0x00,
            0x00, 0x41, 0x00, 0x42,
        ]);
        expect(frame.contents).toEqual(['A', 'B']);
    });

    it('should not split v2.3 frames outside the slash list', () => {
        const frame = new TextFrame(new FrameID('TIT2', 3), frameBytes('TIT2', textBody('AC/DC'), 3));
        expect(frame.contents).toEqual(['AC/DC']);
    });

    it('should write UTF-8 for text outside ASCII', () => {
        const frame = new TextFrame(new FrameID('TIT2'), 'Ünïcode');
        const written = frame.write();
        expect(written[10]).toBe(0x03);
        expect(written.subarray(11).toString('utf8')).toBe('Ünïcode');
    });

    it('should join and append values', () => {
        const frame = new TextFrame(new FrameID('TCON'));
        frame.contents = ['Rock', '', 'Pop'];
        frame.append('Jazz');
        expect(frame.content).toBe('Rock\0Pop\0Jazz');
        expect(frame.isEdited()).toBe(true);
    });

    it('should write nothing for an empty frame', () => {
        const frame = new TextFrame(new FrameID('TIT2'));
        expect(frame.isEmpty()).toBe(true);
        expect(frame.write().length).toBe(0);
    });

    it('should revert edits', () => {
        const frame = new TextFrame(new FrameID('TIT2'), frameBytes('TIT2', textBody('Hello')));
        frame.content = 'Bye';
        expect(frame.isEdited()).toBe(true);
        frame.revert();
        expect(frame.content).toBe('Hello');
        expect(frame.isEdited()).toBe(false);
    });

    it('should ignore edits of read-only frames', () => {
        const frame = new TextFrame(new FrameID('TIT2'), frameBytes('TIT2', textBody('Locked'), 4, [0x10, 0x00]));
        expect(frame.flag(FrameFlag.ReadOnly)).toBe(true);
        frame.content = 'Changed';
        expect(frame.content).toBe('Locked');
    });

    it('should keep the read-only flag when written', () => {
        const frame = new TextFrame(new FrameID('TIT2', 3), frameBytes('TIT2', textBody('A'), 3, [0x20, 0x00]));
        const written = frame.write();
        expect(written[8]).toBe(0x10);
        expect(written[9]).toBe(0x00);
    });

    it('should read the group byte and skip it', () => {
        const v4 = new TextFrame(new FrameID('TIT2'), frameBytes('TIT2', [0x05, 0x00, 0x48, 0x69], 4, [0x00, 0x40]));
        expect(v4.headerSize()).toBe(11);
        expect(v4.groupIdentity()).toBe(5);
        expect(v4.content).toBe('Hi');

        const v3 = new TextFrame(new FrameID('TIT2', 3), frameBytes('TIT2', [0x07, 0x00, 0x48, 0x69], 3, [0x00, 0x20]));
        expect(v3.groupIdentity()).toBe(7);
        expect(v3.content).toBe('Hi');
    });

    it('should treat compressed and encrypted frames as null', () => {
        expect(new TextFrame(new FrameID('TIT2'), frameBytes('TIT2', textBody('x'), 4, [0x00, 0x08])).isNull()).toBe(true);
        expect(new TextFrame(new FrameID('TIT2', 3), frameBytes('TIT2', textBody('x'), 3, [0x00, 0x40])).isNull()).toBe(true);
    });

    it('should compare frames by content', () => {
        const a = new TextFrame(new FrameID('TIT2'), 'Same');
        const b = new TextFrame(new FrameID('TIT2'), frameBytes('TIT2', textBody('Same')));
        const c = new TextFrame(new FrameID('TALB'), 'Same');
        expect(a.equals(b)).toBe(true);
        expect(a.equals(c)).toBe(false);
    });

    it('should summarise itself as JSON', () => {
        const frame = new TextFrame(new FrameID('TIT2'), 'Song');
        expect(frame.toJSON()).toEqual({ id: 'TIT2', type: 'text', null: false, content: 'Song' });
    });
});

describe('NumericalTextFrame', () => {
    it('should reject content with non-digits', () => {
        const frame = new NumericalTextFrame(new FrameID('TYER'), '12a3');
        expect(frame.content).toBe('');
        frame.content = '1234';
        expect(frame.content).toBe('1234');
        frame.content = '12a3';
        expect(frame.content).toBe('');
    });

    it('should drop non-numeric values when decoding', () => {
        const frame = new NumericalTextFrame(new FrameID('TYER'), frameBytes('TYER', textBody('2001\0abc')));
        expect(frame.content).toBe('2001');
        expect(frame.value).toBe(2001);
    });

    it('should join numbers with the separator', () => {
        const frame = new NumericalTextFrame(new FrameID('TBPM'));
        frame.setNumbers([120, 128]);
        expect(frame.content).toBe('120\0128');
        expect(frame.values).toEqual([120, 128]);
        frame.append(90);
        frame.append('x');
        expect(frame.values).toEqual([120, 128, 90]);
    });

    it('should read 0 when empty', () => {
        expect(new NumericalTextFrame(new FrameID('TLEN')).value).toBe(0);
        expect(new NumericalTextFrame(new FrameID('TLEN'), 300).value).toBe(300);
    });
});

describe('DescriptiveTextFrame', () => {
    it('should read language, description and content', () => {
        const body = Buffer.concat([Buffer.from([0x00]), Buffer.from('engdesc\0text', 'latin1')]);
        const frame = new DescriptiveTextFrame(new FrameID('COMM'), descriptiveOptions(FrameType.COMM), frameBytes('COMM', body));
        expect(frame.language).toBe('eng');
        expect(frame.description).toBe('desc');
        expect(frame.content).toBe('text');
    });

    it('should find UTF-16 terminators on character boundaries', () => {
        const body = Buffer.from([
            0x01, 0x65, 0x6E, 0x67,
            0xFF, 0xFE, 0x64, 0x00, 0x00, 0x00,
            0xFF, 0xFE, 0x74, 0x00,
        ]);
        const frame = new DescriptiveTextFrame(new FrameID('COMM'), descriptiveOptions(FrameType.COMM), frameBytes('COMM', body));
        expect(frame.description).toBe('d');
        expect(frame.content).toBe('t');
    });

    it('should take everything as content when the description is not terminated', () => {
        const body = Buffer.concat([Buffer.from([0x00]), Buffer.from('engabc', 'latin1')]);
        const frame = new DescriptiveTextFrame(new FrameID('COMM'), descriptiveOptions(FrameType.COMM), frameBytes('COMM', body));
        expect(frame.isNull()).toBe(false);
        expect(frame.description).toBe('');
        expect(frame.content).toBe('abc');
    });

    it('should be null when too short for the language', () => {
        const frame = new DescriptiveTextFrame(new FrameID('COMM'), descriptiveOptions(FrameType.COMM), frameBytes('COMM', [0x00, 0x65, 0x6E, 0x67]));
        expect(frame.isNull()).toBe(true);
    });

    it('should read USER frames without a description', () => {
        const body = Buffer.concat([Buffer.from([0x00]), Buffer.from('engterms', 'latin1')]);
        const frame = new DescriptiveTextFrame(new FrameID('USER'), descriptiveOptions(FrameType.USER), frameBytes('USER', body));
        expect(frame.hasDescription()).toBe(false);
        expect(frame.content).toBe('terms');
    });

    it('should read WXXX content as Latin-1', () => {
        const body = Buffer.concat([
            Buffer.from([0x01, 0xFF, 0xFE, 0x64, 0x00, 0x00, 0x00]),
            Buffer.from('http://example.test', 'latin1'),
        ]);
        const frame = new DescriptiveTextFrame(new FrameID('WXXX'), descriptiveOptions(FrameType.WXXX), frameBytes('WXXX', body));
        expect(frame.description).toBe('d');
        expect(frame.content).toBe('http://example.test');
    });

    it('should write a placeholder language when none is set', () => {
        const frame = new DescriptiveTextFrame(new FrameID('COMM'), descriptiveOptions(FrameType.COMM), { content: 'hi', description: 'd' });
        expect([...frame.write()]).toEqual([
            0x43, 0x4F, 0x4D, 0x4D, 0x00, 0x00, 0x00, 0x08, 0x00, 0x00,
            0x03, 0x78, 0x78, 0x78, 0x64, 0x00, 0x68, 0x69,
        ]);
        expect(frame.language).toBe('xxx');
    });

    it('should reject languages that are not three letters', () => {
        const frame = new DescriptiveTextFrame(new FrameID('USLT'), descriptiveOptions(FrameType.USLT), { content: 'la', language: 'en' });
        expect(frame.language).toBe('');
        frame.language = 'deu';
        expect(frame.language).toBe('deu');
    });
});

describe('URLTextFrame', () => {
    it('should read and write Latin-1 without an encoding byte', () => {
        const frame = new URLTextFrame(new FrameID('WOAR'), frameBytes('WOAR', Buffer.from('http://a.test', 'latin1')));
        expect(frame.type).toBe(FrameClass.URLText);
        expect(frame.content).toBe('http://a.test');
        expect(frame.write().subarray(10).toString('latin1')).toBe('http://a.test');
    });
});

describe('UnknownFrame', () => {
    it('should keep the payload and move the flags to v2.4 bits', () => {
        const source = new FrameBytes(3, Buffer.concat([
            Buffer.from('PRIV', 'latin1'),
            Buffer.from([0x00, 0x00, 0x00, 0x03, 0x20, 0x00, 0x01, 0x02, 0x03]),
        ]));
        const frame = new UnknownFrame(new FrameID('PRIV'), source);
        expect(frame.isNull()).toBe(false);
        expect([...frame.write()]).toEqual([
            0x50, 0x52, 0x49, 0x56, 0x00, 0x00, 0x00, 0x03, 0x10, 0x00, 0x01, 0x02, 0x03,
        ]);
    });

    it('should be dropped when it asks to be discarded on tag changes', () => {
        const frame = new UnknownFrame(new FrameID('PRIV'), frameBytes('PRIV', [0x01], 3, [0x80, 0x00]));
        expect(frame.write().length).toBe(0);
        expect(frame.isNull()).toBe(true);
    });

    it('should be null when built without bytes', () => {
        expect(new UnknownFrame().isNull()).toBe(true);
    });
});
