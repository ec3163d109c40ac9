import {
    FrameAliases,
    FrameType,
    LegacyFrameIDs,
    MultipleAllowedFrames,
    WRITE_VERSION,
    lookupFrameType,
} from './frame-definitions';

/*
 **  Canonical identity of a frame. Two IDs are equal when they name the
 **  same FrameType, so 'TT2' read from a v2.2 tag equals 'TIT2'.
 */
export class FrameID {
    public readonly type: FrameType;

    /*
    **  id      => raw identifier, padding NULs/spaces and case are ignored
    **  version => major version the id was read under, v2.2 ids are converted
    */
    constructor(id: string, version: number = WRITE_VERSION) {
        let normalized = id.replace(/[\0\s]+/g, '').toUpperCase();
        if (version < 3) {
            normalized = LegacyFrameIDs.get(normalized) ?? FrameType.Unknown;
        }
        this.type = lookupFrameType(normalized);
    }

    /*
    **  Accepts a friendly name ('title', 'albumArtist', ...) or a frame id
    */
    public static fromAlias(nameOrId: string): FrameID {
        return new FrameID(Object.hasOwn(FrameAliases, nameOrId) ? FrameAliases[nameOrId] : nameOrId);
    }

    public get id(): string {
        return this.type;
    }

    public isUnknown(): boolean {
        return this.type === FrameType.Unknown;
    }

    public allowsMultiple(): boolean {
        return MultipleAllowedFrames.has(this.type);
    }

    public equals(other: FrameID | FrameType): boolean {
        return other instanceof FrameID ? other.type === this.type : other === this.type;
    }

    public toString(): string {
        return this.type;
    }
}
