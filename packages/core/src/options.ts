import { z, ZodError } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './logger';

// the codec never holds more than this many payload bytes in a single piece, unless told otherwise
export const DEFAULT_CHUNK_SIZE = 4 * 1024 * 1024;

export const LogLevelSchema = z.enum(LOG_LEVELS);

const ChunkSizeSchema = z.number().int().positive();

export const ClientOptionsSchema = z.object({
    baseUrl: z.string().url(),
    chunkSize: ChunkSizeSchema.default(DEFAULT_CHUNK_SIZE),
    logLevel: LogLevelSchema.default('warn'),
});

export type ClientOptions = z.input<typeof ClientOptionsSchema>;
export type ResolvedClientOptions = z.output<typeof ClientOptionsSchema>;

export const MockServerOptionsSchema = z.object({
    chunkSize: ChunkSizeSchema.default(DEFAULT_CHUNK_SIZE),
    logLevel: LogLevelSchema.default('info'),
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8000),
});

export type MockServerOptions = z.input<typeof MockServerOptionsSchema>;
export type ResolvedMockServerOptions = z.output<typeof MockServerOptionsSchema>;

/**
 * validate an options object against its schema, filling in defaults
 * @throws ConfigError listing every offending field
 */
export function parseOptions<Schema extends z.ZodTypeAny>(schema: Schema, input: unknown): z.output<Schema> {
    try {
        return schema.parse(input);
    } catch (e) {
        if (e instanceof ZodError) {
            const problems = e.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
            throw new ConfigError(`invalid options: ${problems.join('; ')}`, { cause: e });
        }
        throw e;
    }
}
