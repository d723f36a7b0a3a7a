import { existsSync, readFileSync, writeFileSync } from 'fs';
import { ConfigParseError } from '../store/errors';
import { ShowService } from '../services/show-service';
import { StationService } from '../services/station-service';
import { TestWorkspace, createWorkspace, showForm } from './helpers';

describe('StationService', () => {
  let workspace: TestWorkspace;
  let stations: StationService;
  let shows: ShowService;

  beforeEach(() => {
    workspace = createWorkspace();
    stations = new StationService(workspace.store);
    shows = new ShowService(workspace.store);
  });

  afterEach(() => {
    workspace.cleanup();
  });

  describe('saveStation', () => {
    it('should add a station', () => {
      const result = stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });

      expect(result).toEqual({ status: 'saved', key: 'kexp', message: "Station 'kexp' saved successfully." });
      expect(stations.getStation('kexp')).toEqual({ id: 'kexp', streamUrl: 'https://stream.example/kexp' });
    });

    it('should require both fields and leave the file alone', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });
      const before = readFileSync(workspace.store.stationsFile, 'utf-8');

      const result = stations.saveStation({ station_id: 'wfmu', stream_url: ' ' });

      expect(result).toEqual({
        status: 'invalid',
        message: 'Both station ID and stream URL are required.',
        values: { station_id: 'wfmu', stream_url: ' ' }
      });
      expect(readFileSync(workspace.store.stationsFile, 'utf-8')).toBe(before);
    });

    it('should update the stream URL in place', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/old' });

      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/new' }, 'kexp');

      expect(stations.listStations()).toEqual([{ id: 'kexp', streamUrl: 'https://stream.example/new' }]);
    });

    it('should move shows over to a renamed station', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });
      stations.saveStation({ station_id: 'wfmu', stream_url: 'https://stream.example/wfmu' });
      shows.saveShow(showForm({ show_key: 'one', station: 'kexp' }));
      shows.saveShow(showForm({ show_key: 'two', station: 'kexp' }));
      shows.saveShow(showForm({ show_key: 'three', station: 'wfmu' }));

      const result = stations.saveStation({ station_id: 'kexp-fm', stream_url: 'https://stream.example/kexp' }, 'kexp');

      expect(result).toMatchObject({
        status: 'saved',
        message: "Station 'kexp-fm' saved successfully. 2 show(s) now use the new ID."
      });
      expect(stations.stationIds()).toEqual(['kexp-fm', 'wfmu']);
      expect(shows.listShows().map((show) => [show.key, show.entry.station])).toEqual([
        ['one', 'kexp-fm'],
        ['three', 'wfmu'],
        ['two', 'kexp-fm']
      ]);
    });

    it('should not rewrite the shows file when no show uses the renamed station', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });

      const result = stations.saveStation({ station_id: 'kexp-fm', stream_url: 'https://stream.example/kexp' }, 'kexp');

      expect(result).toMatchObject({ status: 'saved', message: "Station 'kexp-fm' saved successfully." });
      expect(existsSync(workspace.store.showsFile)).toBe(false);
    });

    it('should write nothing when the shows file is broken during a rename', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });
      writeFileSync(workspace.store.showsFile, '{"morning-drive": ');
      const stationsBefore = readFileSync(workspace.store.stationsFile, 'utf-8');

      expect(() =>
        stations.saveStation({ station_id: 'kexp-fm', stream_url: 'https://stream.example/kexp' }, 'kexp')
      ).toThrow(ConfigParseError);
      expect(readFileSync(workspace.store.stationsFile, 'utf-8')).toBe(stationsBefore);
      expect(readFileSync(workspace.store.showsFile, 'utf-8')).toBe('{"morning-drive": ');
    });

    it('should refuse __proto__ as a station ID', () => {
      const result = stations.saveStation({ station_id: '__proto__', stream_url: 'https://stream.example/x' });

      expect(result).toMatchObject({ status: 'invalid', message: "'__proto__' cannot be used as a station ID." });
      expect(existsSync(workspace.store.stationsFile)).toBe(false);
    });

    it('should refuse to rename onto an existing station', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });
      stations.saveStation({ station_id: 'wfmu', stream_url: 'https://stream.example/wfmu' });

      const result = stations.saveStation({ station_id: 'wfmu', stream_url: 'https://stream.example/kexp' }, 'kexp');

      expect(result).toMatchObject({ status: 'invalid', message: "Station 'wfmu' already exists." });
      expect(stations.getStation('wfmu')?.streamUrl).toBe('https://stream.example/wfmu');
    });

    it('should report an unknown original station', () => {
      expect(stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' }, 'ghost')).toEqual({
        status: 'not-found',
        message: "Station 'ghost' was not found."
      });
    });
  });

  describe('deleteStation', () => {
    it('should be a no-op for a station that does not exist', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });
      const before = readFileSync(workspace.store.stationsFile, 'utf-8');

      expect(stations.deleteStation('ghost')).toEqual({ status: 'not-found', message: "Station 'ghost' was not found." });
      expect(readFileSync(workspace.store.stationsFile, 'utf-8')).toBe(before);
    });

    it('should not create the file when deleting from an absent file', () => {
      expect(stations.deleteStation('ghost').status).toBe('not-found');
      expect(existsSync(workspace.store.stationsFile)).toBe(false);
    });

    it('should say how many shows still reference a deleted station', () => {
      stations.saveStation({ station_id: 'kexp', stream_url: 'https://stream.example/kexp' });
      shows.saveShow(showForm({ station: 'kexp' }));

      expect(stations.deleteStation('kexp')).toEqual({
        status: 'deleted',
        message: "Station 'kexp' deleted. 1 show(s) still reference it."
      });
      expect(stations.listStations()).toEqual([]);
      expect(shows.getShow('morning-drive')?.entry.station).toBe('kexp');
    });
  });

  describe('referenceCounts', () => {
    it('should count shows per station', () => {
      shows.saveShow(showForm({ show_key: 'one', station: 'kexp' }));
      shows.saveShow(showForm({ show_key: 'two', station: 'kexp' }));
      shows.saveShow(showForm({ show_key: 'three', station: 'wfmu' }));

      const counts = stations.referenceCounts();

      expect(counts.get('kexp')).toBe(2);
      expect(counts.get('wfmu')).toBe(1);
      expect(stations.showsReferencing('nobody')).toBe(0);
    });
  });
});
