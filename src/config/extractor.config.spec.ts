import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '../common/errors';
import { loadExtractorConfig } from './extractor.config';
import {
  createTempDir,
  removeTempDir,
} from '../../test/utils/test-helpers';

describe('loadExtractorConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    configPath = join(dir, 'extractor.json');
    await writeFile(
      configPath,
      JSON.stringify({ apiKey: 'file-key', input: { filename: 'trials.csv' } }),
    );
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should read the file named by EXTRACTOR_CONFIG', () => {
    expect(loadExtractorConfig({ EXTRACTOR_CONFIG: configPath })).toEqual({
      apiKey: 'file-key',
      input: { filename: 'trials.csv' },
    });
  });

  it('should let the environment override key and URL', () => {
    const config = loadExtractorConfig({
      EXTRACTOR_CONFIG: configPath,
      METEOBLUE_API_KEY: 'test-secret',
      METEOBLUE_API_URL: 'https://api.example.test/query',
    });
    expect(config.apiKey).toBe('test-secret');
    expect(config.apiUrl).toBe('https://api.example.test/query');
  });

  it('should fail when the file is missing', () => {
    expect(() =>
      loadExtractorConfig({ EXTRACTOR_CONFIG: join(dir, 'missing.json') }),
    ).toThrow(ConfigurationError);
  });

  it('should fail when the file is not a JSON object', async () => {
    await writeFile(configPath, '[1, 2]');
    expect(() => loadExtractorConfig({ EXTRACTOR_CONFIG: configPath })).toThrow(
      /must contain a JSON object$/,
    );
  });
});
