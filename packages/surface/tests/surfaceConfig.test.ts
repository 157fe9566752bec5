import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  clearConfigCache,
  loadSurfaceConfig,
  parseSurfaceConfig,
  SurfaceConfigError,
} from '../src/config/surfaceConfig.js';

const CONFIG_PATH = fileURLToPath(new URL('../../../config/surface.yaml', import.meta.url));

describe('surfaceConfig', () => {
  afterEach(() => {
    clearConfigCache();
    vi.unstubAllEnvs();
  });

  describe('parseSurfaceConfig', () => {
    it('should parse a complete configuration', () => {
      const config = parseSurfaceConfig(
        [
          'server:',
          '  host: 0.0.0.0',
          '  port: 4000',
          'logging:',
          '  level: debug',
          'controller:',
          '  maxPendingCommands: 10',
        ].join('\n')
      );

      expect(config).toEqual({
        server: { host: '0.0.0.0', port: 4000 },
        logging: { level: 'debug' },
        controller: { maxPendingCommands: 10 },
      });
    });

    it('should apply defaults for optional sections', () => {
      const config = parseSurfaceConfig('server:\n  host: localhost\n  port: 3001\n');

      expect(config.logging).toEqual({ level: 'info' });
      expect(config.controller).toEqual({ maxPendingCommands: 100 });
    });

    it('should reject a missing server section', () => {
      expect(() => parseSurfaceConfig('logging:\n  level: info\n')).toThrow(
        'Invalid surface configuration: server: Required'
      );
    });

    it('should reject a document that is not a mapping', () => {
      expect(() => parseSurfaceConfig('42')).toThrow(
        'Invalid surface configuration: (root): Expected object, received number'
      );
    });

    it('should list every issue', () => {
      let caught: unknown;
      try {
        parseSurfaceConfig(
          'server:\n  host: localhost\n  port: 70000\nlogging:\n  level: verbose\n'
        );
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SurfaceConfigError);
      if (!(caught instanceof SurfaceConfigError)) return;
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toBe('server.port: Number must be less than or equal to 65535');
      expect(caught.issues[1]?.startsWith('logging.level: ')).toBe(true);
    });
  });

  describe('loadSurfaceConfig', () => {
    it('should load the bundled configuration file', () => {
      const config = loadSurfaceConfig(CONFIG_PATH);

      expect(config).toEqual({
        server: { host: '127.0.0.1', port: 3001 },
        logging: { level: 'info' },
        controller: { maxPendingCommands: 100 },
      });
    });

    it('should read the path from SURFACE_CONFIG_PATH', () => {
      vi.stubEnv('SURFACE_CONFIG_PATH', CONFIG_PATH);

      expect(loadSurfaceConfig().server.port).toBe(3001);
    });

    it('should cache until cleared', () => {
      const first = loadSurfaceConfig(CONFIG_PATH);

      expect(loadSurfaceConfig('/does/not/exist.yaml')).toBe(first);

      clearConfigCache();
      expect(() => loadSurfaceConfig('/does/not/exist.yaml')).toThrow();
    });
  });
});
