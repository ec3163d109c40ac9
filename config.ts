import { z } from 'zod';
import { ConfigurationError } from './errors';

const ConfigSchema = z.object({
    ID3_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
    // Padding used when a file has no tag, or the new tag won't fit
    ID3_PADDING_SIZE: z.coerce.number().int().nonnegative().default(2048),
    // Existing padding above this is given back to the file on rewrite
    ID3_MAX_PADDING_REUSE: z.coerce.number().int().nonnegative().default(10240),
});

export interface Id3Config {
    logLevel: z.infer<typeof ConfigSchema>['ID3_LOG_LEVEL'];
    paddingSize: number;
    maxPaddingReuse: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Id3Config {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`);
    }
    return {
        logLevel: parsed.data.ID3_LOG_LEVEL,
        paddingSize: parsed.data.ID3_PADDING_SIZE,
        maxPaddingReuse: parsed.data.ID3_MAX_PADDING_REUSE,
    };
}

export const config = loadConfig();
