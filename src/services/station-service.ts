import { ConfigStore } from '../store/config-store';
import { DeleteResult, SaveResult, Show, Station } from '../types';
import { logger } from '../utils/logger';
import { compareKeys } from '../utils/sort';
import { STATION_FORM_INPUTS, StationFormSchema, echoFormValues, firstIssue } from './forms';

export class StationService {
  constructor(private readonly store: ConfigStore) {}

  public listStations(): Station[] {
    return this.store.loadStations().sort((a, b) => compareKeys(a.id, b.id));
  }

  public getStation(id: string): Station | undefined {
    return this.store.loadStations().find((station) => station.id === id);
  }

  public stationIds(): string[] {
    return this.listStations().map((station) => station.id);
  }

  // Station ID -> number of shows recording from it
  public referenceCounts(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const show of this.store.loadShows()) {
      const station = show.entry.station;
      if (station !== undefined) {
        counts.set(station, (counts.get(station) ?? 0) + 1);
      }
    }
    return counts;
  }

  public showsReferencing(id: string): number {
    return this.referenceCounts().get(id) ?? 0;
  }

  /**
   * Creates a station, or updates `originalId` when given. Renaming a station
   * moves every show that pointed at the old ID over to the new one.
   */
  public saveStation(form: unknown, originalId?: string): SaveResult {
    const stations = this.store.loadStations();
    const original = originalId === undefined ? undefined : stations.find((station) => station.id === originalId);

    if (originalId !== undefined && !original) {
      return { status: 'not-found', message: `Station '${originalId}' was not found.` };
    }

    const parsed = StationFormSchema.safeParse(form);
    if (!parsed.success) {
      return { status: 'invalid', message: firstIssue(parsed.error), values: echoFormValues(form, STATION_FORM_INPUTS) };
    }

    const { station_id: id, stream_url: streamUrl } = parsed.data;
    if (original && original.id !== id && stations.some((station) => station.id === id)) {
      return {
        status: 'invalid',
        message: `Station '${id}' already exists.`,
        values: echoFormValues(form, STATION_FORM_INPUTS)
      };
    }

    const targetId = original ? original.id : id;
    const updated: Station = { id, streamUrl };
    const next = stations.some((station) => station.id === targetId)
      ? stations.map((station) => (station.id === targetId ? updated : station))
      : [...stations, updated];

    // Shows are read before either file is written
    const moved = original && original.id !== id ? this.moveShows(original.id, id) : undefined;

    this.store.saveStations(next);
    let message = `Station '${id}' saved successfully.`;
    if (moved && moved.count > 0) {
      this.store.saveShows(moved.shows);
      logger.info({ from: originalId, to: id, shows: moved.count }, 'Shows moved to renamed station');
      message += ` ${moved.count} show(s) now use the new ID.`;
    }

    logger.info({ id, originalId }, 'Station saved');
    return { status: 'saved', key: id, message };
  }

  public deleteStation(id: string): DeleteResult {
    const stations = this.store.loadStations();
    if (!stations.some((station) => station.id === id)) {
      return { status: 'not-found', message: `Station '${id}' was not found.` };
    }

    this.store.saveStations(stations.filter((station) => station.id !== id));
    logger.info({ id }, 'Station deleted');

    const remaining = this.showsReferencing(id);
    const message = remaining > 0
      ? `Station '${id}' deleted. ${remaining} show(s) still reference it.`
      : `Station '${id}' deleted.`;
    return { status: 'deleted', message };
  }

  private moveShows(from: string, to: string): { shows: Show[]; count: number } {
    let count = 0;
    const shows = this.store.loadShows().map((show): Show => {
      if (show.entry.station !== from) {
        return show;
      }
      count += 1;
      return { key: show.key, entry: { ...show.entry, station: to } };
    });
    return { shows, count };
  }
}
