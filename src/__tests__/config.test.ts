import { join } from 'path';
import { config } from '../config';

describe('config', () => {
  it('should place both files in the configured directory', () => {
    expect(config.configDir).toBe('./test-config');
    expect(config.showsFile).toBe(join('./test-config', 'config_shows.json'));
    expect(config.stationsFile).toBe(join('./test-config', 'config_stations.json'));
  });

  it('should take the log level and environment from the environment', () => {
    expect(config.logLevel).toBe('silent');
    expect(config.nodeEnv).toBe('test');
  });

  it('should fall back to the default port', () => {
    expect(config.port).toBe(5000);
  });
});
