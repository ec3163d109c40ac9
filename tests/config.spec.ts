import { loadConfig } from '../config';
import { ConfigurationError, FileNotFoundError, Id3Error, Id3ErrorCode, TagSizeError } from '../errors';

describe('loadConfig', () => {
    it('should use the defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({ logLevel: 'warn', paddingSize: 2048, maxPaddingReuse: 10240 });
    });

    it('should read numbers from strings', () => {
        const loaded = loadConfig({ ID3_LOG_LEVEL: 'debug', ID3_PADDING_SIZE: '512', ID3_MAX_PADDING_REUSE: '0' });
        expect(loaded).toEqual({ logLevel: 'debug', paddingSize: 512, maxPaddingReuse: 0 });
    });

    it('should reject invalid values', () => {
        expect(() => loadConfig({ ID3_PADDING_SIZE: '-1' })).toThrow(ConfigurationError);
        try {
            loadConfig({ ID3_LOG_LEVEL: 'loud' });
        } catch (err) {
            expect(err).toBeInstanceOf(Id3Error);
            expect(err instanceof Id3Error && err.code).toBe(Id3ErrorCode.INVALID_CONFIG);
            return;
        }
        throw new Error('loadConfig should have thrown');
    });
});

describe('errors', () => {
    it('should carry a code and a name', () => {
        const error = new TagSizeError(300000000);
        expect(error).toBeInstanceOf(Error);
        expect(error.code).toBe(Id3ErrorCode.TAG_SIZE);
        expect(error.name).toBe('TagSizeError');
        expect(error.message).toBe('Tag size 300000000 exceeds the ID3v2 maximum');
    });

    it('should mention the cause', () => {
        const error = new FileNotFoundError('a.mp3', new Error('ENOENT'));
        expect(error.message).toBe('Could not open file: a.mp3 (ENOENT)');
        expect(error.path).toBe('a.mp3');
    });
});
