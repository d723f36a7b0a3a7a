import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema)
  ])
);

/**
 * One show in config_shows.json. The named fields are the ones the recording
 * host reads; any other field is carried through untouched.
 */
export interface ShowEntry {
  show?: string;
  station?: string;
  'artwork-file'?: string;
  'remote-directory'?: string;
  frequency?: string;
  'playlist-db-slug'?: string;
  [field: string]: JsonValue | undefined;
}

export const ShowEntrySchema = z
  .object({
    show: z.string().optional(),
    station: z.string().optional(),
    'artwork-file': z.string().optional(),
    'remote-directory': z.string().optional(),
    frequency: z.string().optional(),
    'playlist-db-slug': z.string().optional()
  })
  .catchall(z.lazy(() => JsonValueSchema));

export const ShowsFileSchema = z.record(z.string(), ShowEntrySchema);

// Station ID -> stream URL
export const StationsFileSchema = z.record(z.string(), z.string());
