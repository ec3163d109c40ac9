import { FrameType } from '../frame-definitions';
import { FrameID } from '../frame-id';

describe('FrameID', () => {
    it('should canonicalise known ids', () => {
        const id = new FrameID('tit2 ');
        expect(id.type).toBe(FrameType.TIT2);
        expect(id.id).toBe('TIT2');
        expect(id.isUnknown()).toBe(false);
    });

    it('should map unknown ids to XXXX', () => {
        const id = new FrameID('ZZZZ');
        expect(id.id).toBe('XXXX');
        expect(id.isUnknown()).toBe(true);
    });

    it('should convert ID3v2.2 ids', () => {
        const legacy = new FrameID('TT2', 2);
        expect(legacy.equals(new FrameID('TIT2'))).toBe(true);
        expect(legacy.equals(FrameType.TIT2)).toBe(true);
        expect(new FrameID('PIC', 2).type).toBe(FrameType.APIC);
    });

    it('should not convert three letter ids of later versions', () => {
        expect(new FrameID('TT2', 3).isUnknown()).toBe(true);
        expect(new FrameID('ZZZ', 2).isUnknown()).toBe(true);
    });

    it('should know which frames may repeat', () => {
        expect(new FrameID('COMM').allowsMultiple()).toBe(true);
        expect(new FrameID('APIC').allowsMultiple()).toBe(true);
        expect(new FrameID('TIT2').allowsMultiple()).toBe(false);
    });

    it('should resolve aliases', () => {
        expect(FrameID.fromAlias('title').type).toBe(FrameType.TIT2);
        expect(FrameID.fromAlias('TALB').type).toBe(FrameType.TALB);
        expect(FrameID.fromAlias('toString').isUnknown()).toBe(true);
    });
});
