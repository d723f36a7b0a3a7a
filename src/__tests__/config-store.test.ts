import { readFileSync, writeFileSync } from 'fs';
import { ConfigParseError, ConfigValidationError } from '../store/errors';
import { TestWorkspace, createWorkspace } from './helpers';

const MORNING_DRIVE_FILE = `{
  "morning-drive": {
    "artwork-file": "morning.jpg",
    "frequency": "weekly",
    "playlist-db-slug": "morning-drive",
    "remote-directory": "/shows/morning",
    "show": "Morning Drive",
    "station": "kexp"
  }
}`;

describe('ConfigStore', () => {
  let workspace: TestWorkspace;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  describe('shows', () => {
    it('should load an empty list when the file is absent', () => {
      expect(workspace.store.loadShows()).toEqual([]);
    });

    it('should write the format the recording host reads', () => {
      workspace.store.saveShows([
        {
          key: 'morning-drive',
          entry: {
            show: 'Morning Drive',
            station: 'kexp',
            'artwork-file': 'morning.jpg',
            'remote-directory': '/shows/morning',
            frequency: 'weekly',
            'playlist-db-slug': 'morning-drive'
          }
        }
      ]);

      expect(readFileSync(workspace.store.showsFile, 'utf-8')).toBe(MORNING_DRIVE_FILE);
    });

    it('should load records keyed by slug', () => {
      writeFileSync(workspace.store.showsFile, MORNING_DRIVE_FILE);

      const shows = workspace.store.loadShows();

      expect(shows).toHaveLength(1);
      expect(shows[0].key).toBe('morning-drive');
      expect(shows[0].entry.station).toBe('kexp');
      expect(shows[0].entry['playlist-db-slug']).toBe('morning-drive');
    });

    it('should round-trip extra fields unchanged', () => {
      const file = `{
  "night-owl": {
    "notes": {
      "retries": 3
    },
    "show": "Night Owl",
    "station": "wfmu"
  }
}`;
      writeFileSync(workspace.store.showsFile, file);

      const shows = workspace.store.loadShows();
      workspace.store.saveShows(shows);

      expect(shows[0].entry.notes).toEqual({ retries: 3 });
      expect(readFileSync(workspace.store.showsFile, 'utf-8')).toBe(file);
    });

    it('should reject an entry that is not an object', () => {
      writeFileSync(workspace.store.showsFile, '{"morning-drive": "kexp"}');

      expect(() => workspace.store.loadShows()).toThrow(ConfigValidationError);
    });

    it('should surface malformed JSON', () => {
      writeFileSync(workspace.store.showsFile, '{"morning-drive": {');

      expect(() => workspace.store.loadShows()).toThrow(ConfigParseError);
    });
  });

  describe('stations', () => {
    it('should map station IDs to stream URLs', () => {
      workspace.store.saveStations([
        { id: 'wfmu', streamUrl: 'https://stream.example/wfmu' },
        { id: 'kexp', streamUrl: 'https://stream.example/kexp' }
      ]);

      expect(readFileSync(workspace.store.stationsFile, 'utf-8')).toBe(
        '{\n  "kexp": "https://stream.example/kexp",\n  "wfmu": "https://stream.example/wfmu"\n}'
      );
      expect(workspace.store.loadStations()).toEqual([
        { id: 'kexp', streamUrl: 'https://stream.example/kexp' },
        { id: 'wfmu', streamUrl: 'https://stream.example/wfmu' }
      ]);
    });

    it('should load an empty list when the file is absent', () => {
      expect(workspace.store.loadStations()).toEqual([]);
    });
  });

  describe('inspect', () => {
    it('should report record counts for readable files', () => {
      writeFileSync(workspace.store.showsFile, MORNING_DRIVE_FILE);

      const health = workspace.store.inspect();

      expect(health.healthy).toBe(true);
      expect(health.shows).toEqual({ path: workspace.store.showsFile, exists: true, records: 1 });
      expect(health.stations).toEqual({ path: workspace.store.stationsFile, exists: false, records: 0 });
    });

    it('should report the error of an unreadable file', () => {
      writeFileSync(workspace.store.stationsFile, 'not json');

      const health = workspace.store.inspect();

      expect(health.healthy).toBe(false);
      expect(health.stations.exists).toBe(true);
      expect(health.stations.error).toMatch(/^Malformed JSON in /);
    });
  });
});
