import {tmpdir} from 'node:os';

import {describe, expect, it} from 'vitest';

import {loadWebApiConfig} from '../index';

describe('loadWebApiConfig', () => {
  it('applies defaults for the test environment', () => {
    expect(loadWebApiConfig({NODE_ENV: 'test'})).toEqual({
      serviceName: 'gatewire',
      nodeEnv: 'test',
      logging: {level: 'silent'},
      maxBodyBytes: 10 * 1024 * 1024,
      multipartMemoryLimitBytes: 256 * 1024,
      uploadTempDirectory: tmpdir(),
      defaultCharset: 'utf-8',
      debug: false
    });
  });

  it('turns on debug logging in development', () => {
    const config = loadWebApiConfig({NODE_ENV: 'development'});
    expect(config.debug).toBe(true);
    expect(config.logging.level).toBe('debug');
  });

  it('reads explicit overrides', () => {
    const config = loadWebApiConfig({
      NODE_ENV: 'production',
      GATEWIRE_SERVICE_NAME: 'edge-gateway',
      GATEWIRE_LOG_LEVEL: 'warn',
      GATEWIRE_MAX_BODY_BYTES: '2048',
      GATEWIRE_MULTIPART_MEMORY_LIMIT_BYTES: '512',
      GATEWIRE_UPLOAD_TMP_DIR: ' /var/tmp/uploads ',
      GATEWIRE_DEFAULT_CHARSET: 'latin1',
      GATEWIRE_DEBUG: 'TRUE'
    });

    expect(config).toEqual({
      serviceName: 'edge-gateway',
      nodeEnv: 'production',
      logging: {level: 'warn'},
      maxBodyBytes: 2048,
      multipartMemoryLimitBytes: 512,
      uploadTempDirectory: '/var/tmp/uploads',
      defaultCharset: 'latin1',
      debug: true
    });
  });

  it('rejects invalid values at startup', () => {
    expect(() => loadWebApiConfig({GATEWIRE_MAX_BODY_BYTES: 'lots'})).toThrow();
    expect(() => loadWebApiConfig({GATEWIRE_MAX_BODY_BYTES: '0'})).toThrow();
    expect(() => loadWebApiConfig({GATEWIRE_DEBUG: 'sometimes'})).toThrow();
    expect(() => loadWebApiConfig({GATEWIRE_LOG_LEVEL: 'verbose'})).toThrow();
    expect(() => loadWebApiConfig({GATEWIRE_DEFAULT_CHARSET: 'klingon-8'})).toThrow(
      'GATEWIRE_DEFAULT_CHARSET is not a supported charset: klingon-8'
    );
  });
});
