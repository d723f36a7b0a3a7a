import { ConfigStore } from '../store/config-store';
import { DeleteResult, SaveResult, Show, ShowEntry } from '../types';
import { logger } from '../utils/logger';
import { compareKeys } from '../utils/sort';
import { SHOW_FORM_INPUTS, ShowFormSchema, echoFormValues, firstIssue, showFormToEntry } from './forms';

export class ShowService {
  constructor(private readonly store: ConfigStore) {}

  public listShows(): Show[] {
    return this.store.loadShows().sort((a, b) => compareKeys(a.key, b.key));
  }

  public getShow(key: string): Show | undefined {
    return this.store.loadShows().find((show) => show.key === key);
  }

  /**
   * Creates a show, or updates `originalKey` when given. A new show whose key
   * already exists replaces that show; renaming onto an existing key is refused.
   * Nothing is written unless the submission is accepted.
   */
  public saveShow(form: unknown, originalKey?: string): SaveResult {
    const shows = this.store.loadShows();
    const original = originalKey === undefined ? undefined : shows.find((show) => show.key === originalKey);

    if (originalKey !== undefined && !original) {
      return { status: 'not-found', message: `Show '${originalKey}' was not found.` };
    }

    const parsed = ShowFormSchema.safeParse(form);
    if (!parsed.success) {
      return { status: 'invalid', message: firstIssue(parsed.error), values: echoFormValues(form, SHOW_FORM_INPUTS) };
    }

    const key = parsed.data.show_key;
    if (original && original.key !== key && shows.some((show) => show.key === key)) {
      return {
        status: 'invalid',
        message: `A show with key '${key}' already exists.`,
        values: echoFormValues(form, SHOW_FORM_INPUTS)
      };
    }

    const targetKey = original ? original.key : key;
    const previous = shows.find((show) => show.key === targetKey);
    // Fields the form does not know about stay on the entry
    const entry: ShowEntry = { ...previous?.entry, ...showFormToEntry(parsed.data) };
    const updated: Show = { key, entry };

    const next = previous
      ? shows.map((show) => (show.key === targetKey ? updated : show))
      : [...shows, updated];
    this.store.saveShows(next);

    logger.info({ key, originalKey }, 'Show saved');
    return { status: 'saved', key, message: `Show '${key}' saved successfully.` };
  }

  public deleteShow(key: string): DeleteResult {
    const shows = this.store.loadShows();
    if (!shows.some((show) => show.key === key)) {
      return { status: 'not-found', message: `Show '${key}' was not found.` };
    }

    this.store.saveShows(shows.filter((show) => show.key !== key));
    logger.info({ key }, 'Show deleted');
    return { status: 'deleted', message: `Show '${key}' deleted.` };
  }
}
