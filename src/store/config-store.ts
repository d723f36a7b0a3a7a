import { existsSync } from 'fs';
import { FileHealth, Show, Station, StoreHealth } from '../types';
import { logger } from '../utils/logger';
import { describeError } from './errors';
import { loadJson, saveJson } from './json-file';
import { ShowsFileSchema, StationsFileSchema } from './schemas';

export interface ConfigStoreOptions {
  showsFile: string;
  stationsFile: string;
}

/**
 * The two configuration files the recording host reads. Every call goes to
 * disk, so the files stay the single source of truth; there is no locking and
 * the last writer wins.
 */
export class ConfigStore {
  constructor(private readonly options: ConfigStoreOptions) {}

  get showsFile(): string {
    return this.options.showsFile;
  }

  get stationsFile(): string {
    return this.options.stationsFile;
  }

  public loadShows(): Show[] {
    const data = loadJson(this.options.showsFile, ShowsFileSchema) ?? {};
    return Object.entries(data).map(([key, entry]): Show => ({ key, entry }));
  }

  public saveShows(shows: Show[]): void {
    saveJson(this.options.showsFile, Object.fromEntries(shows.map((show) => [show.key, show.entry])));
    logger.debug({ file: this.options.showsFile, count: shows.length }, 'Shows file written');
  }

  public loadStations(): Station[] {
    const data = loadJson(this.options.stationsFile, StationsFileSchema) ?? {};
    return Object.entries(data).map(([id, streamUrl]) => ({ id, streamUrl }));
  }

  public saveStations(stations: Station[]): void {
    saveJson(this.options.stationsFile, Object.fromEntries(stations.map((station) => [station.id, station.streamUrl])));
    logger.debug({ file: this.options.stationsFile, count: stations.length }, 'Stations file written');
  }

  public inspect(): StoreHealth {
    const shows = this.inspectFile(this.options.showsFile, () => this.loadShows().length);
    const stations = this.inspectFile(this.options.stationsFile, () => this.loadStations().length);
    return {
      healthy: shows.error === undefined && stations.error === undefined,
      shows,
      stations
    };
  }

  private inspectFile(path: string, count: () => number): FileHealth {
    const exists = existsSync(path);
    try {
      return { path, exists, records: count() };
    } catch (error) {
      return { path, exists, error: describeError(error) };
    }
  }
}
