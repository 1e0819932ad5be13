import { defaultConfig, type CrateflowConfig } from '@crateflow/config';
import { ConfigurationError } from '@crateflow/core';
import { describe, it, expect } from 'vitest';

import { parseIntervalSecs, resolvePublishSettings } from '../../src/utils/publish-settings.js';

function configWith(publish: Partial<CrateflowConfig['publish']>): CrateflowConfig {
  const config = defaultConfig();
  return { ...config, publish: { ...config.publish, ...publish } };
}

describe('publish-settings', () => {
  describe('parseIntervalSecs', () => {
    it('should accept whole seconds', () => {
      expect(parseIntervalSecs('30')).toBe(30);
      expect(parseIntervalSecs('0')).toBe(0);
    });

    it.each(['-5', '1.5', 'soon', ''])('should reject %j', (value) => {
      expect(() => parseIntervalSecs(value)).toThrow(ConfigurationError);
      expect(() => parseIntervalSecs(value)).toThrow('--publish-interval must be a whole number of seconds');
    });
  });

  describe('resolvePublishSettings', () => {
    it('should use config defaults when no flags are given', () => {
      expect(resolvePublishSettings({}, defaultConfig())).toEqual({
        dryRun: false,
        skipPublished: false,
        resume: false,
        intervalMs: 0,
        token: undefined,
        registry: undefined,
        checkpointFile: 'target/crateflow-checkpoint.yaml',
        strictCheckpoint: true,
      });
    });

    it('should convert the interval to milliseconds with the flag winning', () => {
      const config = configWith({ intervalSecs: 10 });

      expect(resolvePublishSettings({}, config).intervalMs).toBe(10_000);
      expect(resolvePublishSettings({ publishInterval: '2' }, config).intervalMs).toBe(2000);
    });

    it('should enable a behavior when either the flag or the config sets it', () => {
      const config = configWith({ skipPublished: true });

      const settings = resolvePublishSettings({ dryRun: true }, config);

      expect(settings.dryRun).toBe(true);
      expect(settings.skipPublished).toBe(true);
    });

    it('should prefer the registry flag over the config', () => {
      const config = configWith({ registry: 'internal' });

      expect(resolvePublishSettings({}, config).registry).toBe('internal');
      expect(resolvePublishSettings({ registry: 'staging' }, config).registry).toBe('staging');
    });

    it('should pass the token and resume flag through', () => {
      const settings = resolvePublishSettings({ token: 'test-secret', resume: true }, defaultConfig());

      expect(settings.token).toBe('test-secret');
      expect(settings.resume).toBe(true);
    });
  });
});
