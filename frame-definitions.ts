import legacyFrameIds from './data/legacy-frame-ids.json';

/*
 **  Frames and tags are always written as ID3v2.4
 */
export const WRITE_VERSION = 4;

/*
 **  Every ID3v2.3/2.4 frame this library knows about.
 **  Value is the frame ID as written on disk, Unknown covers anything else.
 */
export enum FrameType {
    AENC = 'AENC',
    APIC = 'APIC',
    ASPI = 'ASPI',
    COMM = 'COMM',
    COMR = 'COMR',
    ENCR = 'ENCR',
    EQU2 = 'EQU2',
    EQUA = 'EQUA',
    ETCO = 'ETCO',
    GEOB = 'GEOB',
    GRID = 'GRID',
    IPLS = 'IPLS',
    LINK = 'LINK',
    MCDI = 'MCDI',
    MLLT = 'MLLT',
    OWNE = 'OWNE',
    PCNT = 'PCNT',
    POPM = 'POPM',
    POSS = 'POSS',
    PRIV = 'PRIV',
    RBUF = 'RBUF',
    RVA2 = 'RVA2',
    RVAD = 'RVAD',
    RVRB = 'RVRB',
    SEEK = 'SEEK',
    SIGN = 'SIGN',
    SYLT = 'SYLT',
    SYTC = 'SYTC',
    TALB = 'TALB',
    TBPM = 'TBPM',
    TCOM = 'TCOM',
    TCON = 'TCON',
    TCOP = 'TCOP',
    TDAT = 'TDAT',
    TDEN = 'TDEN',
    TDLY = 'TDLY',
    TDOR = 'TDOR',
    TDRC = 'TDRC',
    TDRL = 'TDRL',
    TDTG = 'TDTG',
    TENC = 'TENC',
    TEXT = 'TEXT',
    TFLT = 'TFLT',
    TIPL = 'TIPL',
    TIME = 'TIME',
    TIT1 = 'TIT1',
    TIT2 = 'TIT2',
    TIT3 = 'TIT3',
    TKEY = 'TKEY',
    TLAN = 'TLAN',
    TLEN = 'TLEN',
    TMCL = 'TMCL',
    TMED = 'TMED',
    TMOO = 'TMOO',
    TOAL = 'TOAL',
    TOFN = 'TOFN',
    TOLY = 'TOLY',
    TOPE = 'TOPE',
    TORY = 'TORY',
    TOWN = 'TOWN',
    TPE1 = 'TPE1',
    TPE2 = 'TPE2',
    TPE3 = 'TPE3',
    TPE4 = 'TPE4',
    TPOS = 'TPOS',
    TPRO = 'TPRO',
    TPUB = 'TPUB',
    TRCK = 'TRCK',
    TRDA = 'TRDA',
    TRSN = 'TRSN',
    TRSO = 'TRSO',
    TSO2 = 'TSO2',
    TSOA = 'TSOA',
    TSOC = 'TSOC',
    TSOP = 'TSOP',
    TSOT = 'TSOT',
    TSIZ = 'TSIZ',
    TSRC = 'TSRC',
    TSSE = 'TSSE',
    TSST = 'TSST',
    TXXX = 'TXXX',
    TYER = 'TYER',
    UFID = 'UFID',
    USER = 'USER',
    USLT = 'USLT',
    WCOM = 'WCOM',
    WCOP = 'WCOP',
    WOAF = 'WOAF',
    WOAR = 'WOAR',
    WOAS = 'WOAS',
    WORS = 'WORS',
    WPAY = 'WPAY',
    WPUB = 'WPUB',
    WXXX = 'WXXX',
    Unknown = 'XXXX',
}

const knownFrameTypes = new Map<string, FrameType>(
    Object.values(FrameType).map(type => [type, type]),
);

export function lookupFrameType(id: string): FrameType {
    return knownFrameTypes.get(id) ?? FrameType.Unknown;
}

/*
 **  ID3v2.2 three letter IDs and their v2.4 replacement
 */
export const LegacyFrameIDs: ReadonlyMap<string, string> = new Map(Object.entries(legacyFrameIds));

/*
 **  Frames that may appear more than once in a tag
 */
export const MultipleAllowedFrames: ReadonlySet<FrameType> = new Set([
    FrameType.AENC,
    FrameType.APIC,
    FrameType.COMM,
    FrameType.COMR,
    FrameType.ENCR,
    FrameType.EQU2,
    FrameType.GEOB,
    FrameType.GRID,
    FrameType.LINK,
    FrameType.POPM,
    FrameType.PRIV,
    FrameType.RVA2,
    FrameType.SIGN,
    FrameType.SYLT,
    FrameType.TXXX,
    FrameType.UFID,
    FrameType.USER,
    FrameType.USLT,
    FrameType.WCOM,
    FrameType.WOAR,
    FrameType.WXXX,
]);

/*
 **  Text frames holding digits only. TRCK and TPOS are left out on purpose,
 **  they can carry a "/total" suffix.
 */
export const NumericalFrames: ReadonlySet<FrameType> = new Set([
    FrameType.TBPM,
    FrameType.TDAT,
    FrameType.TDLY,
    FrameType.TIME,
    FrameType.TLEN,
    FrameType.TORY,
    FrameType.TYER,
]);

/*
 **  v2.3 frames that pack several values with '/' instead of NUL
 */
export const SlashSeparatedFrames: ReadonlySet<FrameType> = new Set([
    FrameType.TCOM,
    FrameType.TEXT,
    FrameType.TOLY,
    FrameType.TOPE,
    FrameType.TPE1,
]);

export interface DescriptiveOptions {
    /* 3 byte language code follows the encoding byte */
    language: boolean;
    /* content is Latin-1 whatever the encoding byte says */
    latin1Content: boolean;
    /* no description between language and content */
    noDescription: boolean;
}

export const DescriptiveFrames: ReadonlyMap<FrameType, DescriptiveOptions> = new Map([
    [FrameType.COMM, { language: true, latin1Content: false, noDescription: false }],
    [FrameType.USLT, { language: true, latin1Content: false, noDescription: false }],
    [FrameType.USER, { language: true, latin1Content: false, noDescription: true }],
    [FrameType.TXXX, { language: false, latin1Content: false, noDescription: false }],
    [FrameType.WXXX, { language: false, latin1Content: true, noDescription: false }],
]);

/*
 **  Friendly names, the object's keys are just for simplicity,
 **  you can also use the ID directly.
 */
export const FrameAliases: Readonly<Record<string, FrameType>> = {
    album:                  FrameType.TALB,
    albumArtist:            FrameType.TPE2,
    albumSortOrder:         FrameType.TSOA,
    artist:                 FrameType.TPE1,
    artistSortOrder:        FrameType.TSOP,
    bpm:                    FrameType.TBPM,
    comment:                FrameType.COMM,
    composer:               FrameType.TCOM,
    conductor:              FrameType.TPE3,
    contentGroup:           FrameType.TIT1,
    copyright:              FrameType.TCOP,
    date:                   FrameType.TDRC,
    encodedBy:              FrameType.TENC,
    encodingTechnology:     FrameType.TSSE,
    eventTiming:            FrameType.ETCO,
    fileOwner:              FrameType.TOWN,
    fileType:               FrameType.TFLT,
    genre:                  FrameType.TCON,
    image:                  FrameType.APIC,
    initialKey:             FrameType.TKEY,
    internetRadioName:      FrameType.TRSN,
    internetRadioOwner:     FrameType.TRSO,
    isrc:                   FrameType.TSRC,
    language:               FrameType.TLAN,
    length:                 FrameType.TLEN,
    mediaType:              FrameType.TMED,
    mood:                   FrameType.TMOO,
    originalArtist:         FrameType.TOPE,
    originalFilename:       FrameType.TOFN,
    originalReleaseDate:    FrameType.TDOR,
    originalTextwriter:     FrameType.TOLY,
    originalTitle:          FrameType.TOAL,
    partOfSet:              FrameType.TPOS,
    playCount:              FrameType.PCNT,
    playlistDelay:          FrameType.TDLY,
    popularimeter:          FrameType.POPM,
    producedNotice:         FrameType.TPRO,
    publisher:              FrameType.TPUB,
    remixArtist:            FrameType.TPE4,
    subtitle:               FrameType.TIT3,
    textWriter:             FrameType.TEXT,
    time:                   FrameType.TIME,
    title:                  FrameType.TIT2,
    titleSortOrder:         FrameType.TSOT,
    trackNumber:            FrameType.TRCK,
    unsynchronisedLyrics:   FrameType.USLT,
    userDefined:            FrameType.TXXX,
    userDefinedUrl:         FrameType.WXXX,
    year:                   FrameType.TYER,
};
