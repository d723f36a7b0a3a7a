import type { ShowEntry } from '../store/schemas';

export type { JsonValue, ShowEntry } from '../store/schemas';

/**
 * Fields of a show entry in the order the forms present them. `input` is the
 * form control name, `field` the key written to config_shows.json.
 */
export const SHOW_FIELDS = [
  { field: 'show', input: 'show', label: 'Show name' },
  { field: 'station', input: 'station', label: 'Station' },
  { field: 'artwork-file', input: 'artwork_file', label: 'Artwork file' },
  { field: 'remote-directory', input: 'remote_directory', label: 'Remote directory' },
  { field: 'frequency', input: 'frequency', label: 'Frequency' },
  { field: 'playlist-db-slug', input: 'playlist_db_slug', label: 'Playlist DB slug' }
] as const;

export type ShowFieldDefinition = (typeof SHOW_FIELDS)[number];
export type ShowField = ShowFieldDefinition['field'];

export interface Show {
  key: string;
  entry: ShowEntry;
}

export interface Station {
  id: string;
  streamUrl: string;
}

// Raw form values keyed by control name, echoed back when a submission is rejected
export type FormValues = Record<string, string>;

export type SaveResult =
  | { status: 'saved'; key: string; message: string }
  | { status: 'invalid'; message: string; values: FormValues }
  | { status: 'not-found'; message: string };

export type DeleteResult =
  | { status: 'deleted'; message: string }
  | { status: 'not-found'; message: string };

export type FlashLevel = 'success' | 'error';

export interface FlashMessage {
  level: FlashLevel;
  message: string;
}

export interface FileHealth {
  path: string;
  exists: boolean;
  records?: number;
  error?: string;
}

export interface StoreHealth {
  healthy: boolean;
  shows: FileHealth;
  stations: FileHealth;
}
