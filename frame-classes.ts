export enum TagVersion {
    v22 = 'ID3v2.2',
    v23 = 'ID3v2.3',
    v24 = 'ID3v2.4',
    unknown = 'unknown',
}

/*
 **  Semantic class of a frame, used as the discriminant of the Frame union
 */
export enum FrameClass {
    Text = 'text',
    NumericalText = 'numerical-text',
    DescriptiveText = 'descriptive-text',
    URLText = 'url-text',
    Picture = 'picture',
    PlayCount = 'play-count',
    Popularimeter = 'popularimeter',
    EventTiming = 'event-timing',
    Unknown = 'unknown',
}

export enum FrameEncoding {
    Latin1 = 0x00,
    UTF16BOM = 0x01,
    UTF16BE = 0x02,
    UTF8 = 0x03,
}

/*
 **  Frame header flags. The bit positions differ between v2.3 and v2.4,
 **  see frame.ts for the mapping.
 */
export enum FrameFlag {
    DiscardForTagAlter = 'discard-for-tag-alter',
    DiscardForFileAlter = 'discard-for-file-alter',
    ReadOnly = 'read-only',
    GroupingIdentity = 'grouping-identity',
    Compressed = 'compressed',
    Encrypted = 'encrypted',
    Unsynchronised = 'unsynchronised',
    DataLengthIndicator = 'data-length-indicator',
}

/*
 **  Officially available types of the picture frame
 */
export enum PictureType {
    Other = 0x00,
    FileIcon = 0x01,
    OtherFileIcon = 0x02,
    FrontCover = 0x03,
    BackCover = 0x04,
    LeafletPage = 0x05,
    Media = 0x06,
    LeadArtist = 0x07,
    Artist = 0x08,
    Conductor = 0x09,
    Band = 0x0A,
    Composer = 0x0B,
    Lyricist = 0x0C,
    RecordingLocation = 0x0D,
    DuringRecording = 0x0E,
    DuringPerformance = 0x0F,
    MovieScreenCapture = 0x10,
    BrightColouredFish = 0x11,
    Illustration = 0x12,
    BandLogotype = 0x13,
    PublisherLogotype = 0x14,
}

export const PictureTypeNames: readonly string[] = [
    'other',
    'file icon',
    'other file icon',
    'front cover',
    'back cover',
    'leaflet page',
    'media',
    'lead artist',
    'artist',
    'conductor',
    'band',
    'composer',
    'lyricist',
    'recording location',
    'during recording',
    'during performance',
    'video screen capture',
    'a bright coloured fish',
    'illustration',
    'band logotype',
    'publisher logotype',
];

export enum TimeStampFormat {
    MPEGFrames = 0x01,
    Milliseconds = 0x02,
}

/*
 **  Event timing codes (ETCO). 0x17-0xDF and 0xF0-0xFC are reserved,
 **  as is 0xFF (one more byte of events follows, not supported).
 */
export enum TimingCode {
    Padding = 0x00,
    InitialSilenceEnd = 0x01,
    IntroStart = 0x02,
    MainPartStart = 0x03,
    OutroStart = 0x04,
    OutroEnd = 0x05,
    VerseStart = 0x06,
    RefrainStart = 0x07,
    InterludeStart = 0x08,
    ThemeStart = 0x09,
    VariationStart = 0x0A,
    KeyChange = 0x0B,
    TimeChange = 0x0C,
    MomentaryUnwantedNoise = 0x0D,
    SustainedNoise = 0x0E,
    SustainedNoiseEnd = 0x0F,
    IntroEnd = 0x10,
    MainPartEnd = 0x11,
    VerseEnd = 0x12,
    RefrainEnd = 0x13,
    ThemeEnd = 0x14,
    Profanity = 0x15,
    ProfanityEnd = 0x16,
    NotPredefinedSynch0 = 0xE0,
    NotPredefinedSynch1 = 0xE1,
    NotPredefinedSynch2 = 0xE2,
    NotPredefinedSynch3 = 0xE3,
    NotPredefinedSynch4 = 0xE4,
    NotPredefinedSynch5 = 0xE5,
    NotPredefinedSynch6 = 0xE6,
    NotPredefinedSynch7 = 0xE7,
    NotPredefinedSynch8 = 0xE8,
    NotPredefinedSynch9 = 0xE9,
    NotPredefinedSynchA = 0xEA,
    NotPredefinedSynchB = 0xEB,
    NotPredefinedSynchC = 0xEC,
    NotPredefinedSynchD = 0xED,
    NotPredefinedSynchE = 0xEE,
    NotPredefinedSynchF = 0xEF,
    AudioEnd = 0xFD,
    AudioFileEnd = 0xFE,
}

export interface Picture {
    data: Buffer;
    mimeType: string;
    description: string;
    type: PictureType;
}

/*
 **  Which ID3 versions were found while reading a tag
 */
export interface TagsOnFile {
    v1: boolean;
    v1_1: boolean;
    v1Extended: boolean;
    v2: boolean;
}

export interface TagHeaderInfo {
    version: TagVersion;
    majorVersion: number;
    minorVersion: number;
    unsynchronised: boolean;
    extendedHeader: boolean;
    experimental: boolean;
    footer: boolean;
    /* Offset of the "ID3" magic */
    start: number;
    /* Size of the tag body, excluding header and footer */
    size: number;
    /* Header + body + footer */
    totalSize: number;
}

export interface FrameSummary {
    id: string;
    type: FrameClass;
    null: boolean;
    [field: string]: unknown;
}

export interface EventTimingCode {
    code: TimingCode;
    /* 0 when the code isn't set */
    value: number;
    milliseconds: boolean;
}
