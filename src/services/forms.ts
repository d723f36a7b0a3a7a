import { z } from 'zod';
import { RESERVED_KEY } from '../store/json-file';
import { FormValues, SHOW_FIELDS, Show, ShowField, Station } from '../types';

const UNREADABLE_FORM = 'The form submission could not be read.';
const STATION_FIELDS_REQUIRED = 'Both station ID and stream URL are required.';

function requiredText(required: string, notText: string) {
  return z
    .string({ required_error: required, invalid_type_error: notText })
    .trim()
    .min(1, required);
}

function identifier(required: string, notText: string, reserved: string) {
  return requiredText(required, notText).refine((value) => value !== RESERVED_KEY, reserved);
}

function showField(field: ShowField) {
  return requiredText(`Field '${field}' is required.`, `Field '${field}' must be a single value.`);
}

export const ShowFormSchema = z.object(
  {
    show_key: identifier(
      'A slug is required for the show.',
      'The show slug must be a single value.',
      `'${RESERVED_KEY}' cannot be used as a show slug.`
    ),
    show: showField('show'),
    station: showField('station'),
    artwork_file: showField('artwork-file'),
    remote_directory: showField('remote-directory'),
    frequency: showField('frequency'),
    playlist_db_slug: showField('playlist-db-slug')
  },
  { required_error: UNREADABLE_FORM, invalid_type_error: UNREADABLE_FORM }
);

export const StationFormSchema = z.object(
  {
    station_id: identifier(
      STATION_FIELDS_REQUIRED,
      'The station ID must be a single value.',
      `'${RESERVED_KEY}' cannot be used as a station ID.`
    ),
    stream_url: requiredText(STATION_FIELDS_REQUIRED, 'The stream URL must be a single value.')
  },
  { required_error: UNREADABLE_FORM, invalid_type_error: UNREADABLE_FORM }
);

export type ShowForm = z.infer<typeof ShowFormSchema>;

export const SHOW_FORM_INPUTS = ['show_key', ...SHOW_FIELDS.map((definition) => definition.input)];
export const STATION_FORM_INPUTS = ['station_id', 'stream_url'];

export function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? UNREADABLE_FORM;
}

function readInput(form: unknown, name: string): string {
  if (typeof form !== 'object' || form === null) {
    return '';
  }
  const value: unknown = Reflect.get(form, name);
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : '';
  }
  return '';
}

/**
 * Picks the named controls out of a submitted body so a rejected form can be
 * rendered again with what the user typed.
 */
export function echoFormValues(form: unknown, names: readonly string[]): FormValues {
  return Object.fromEntries(names.map((name) => [name, readInput(form, name)]));
}

export function showFormToEntry(form: ShowForm): Record<ShowField, string> {
  return {
    show: form.show,
    station: form.station,
    'artwork-file': form.artwork_file,
    'remote-directory': form.remote_directory,
    frequency: form.frequency,
    'playlist-db-slug': form.playlist_db_slug
  };
}

export function showToFormValues(show: Show): FormValues {
  const values: FormValues = { show_key: show.key };
  for (const { field, input } of SHOW_FIELDS) {
    values[input] = show.entry[field] ?? '';
  }
  return values;
}

export function stationToFormValues(station: Station): FormValues {
  return { station_id: station.id, stream_url: station.streamUrl };
}
