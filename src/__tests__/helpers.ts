import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigStore } from '../store/config-store';

export interface TestWorkspace {
  dir: string;
  store: ConfigStore;
  cleanup: () => void;
}

export function createWorkspace(): TestWorkspace {
  const dir = mkdtempSync(join(tmpdir(), 'recorder-admin-'));
  const store = new ConfigStore({
    showsFile: join(dir, 'config_shows.json'),
    stationsFile: join(dir, 'config_stations.json')
  });
  return { dir, store, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function showForm(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    show_key: 'morning-drive',
    show: 'Morning Drive',
    station: 'kexp',
    artwork_file: 'morning.jpg',
    remote_directory: '/shows/morning',
    frequency: 'weekly',
    playlist_db_slug: 'morning-drive',
    ...overrides
  };
}
