import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';
import { AppConfigError, loadAppConfig } from './appConfig';

function createTempFile(prefix: string): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(16)}.json`);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadAppConfig', () => {
  it('returns defaults when no path is given', () => {
    const config = loadAppConfig(undefined);
    expect(config).toEqual({
      responseModalities: ['AUDIO'],
      googleSearch: true,
      contextWindowCompression: false,
      tools: {},
    });
  });

  it('returns defaults when the file does not exist', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = loadAppConfig(createTempFile('app-config-missing'));
    expect(config.googleSearch).toBe(true);
    expect(config.responseModalities).toEqual(['AUDIO']);
  });

  it('loads and trims a valid config file', async () => {
    const filePath = createTempFile('app-config-valid');
    await fs.writeFile(
      filePath,
      JSON.stringify({
        systemInstruction: '  Answer briefly.  ',
        voiceName: 'Puck',
        responseModalities: ['TEXT'],
        googleSearch: false,
        tools: { allowlist: ['get_current_time'] },
      }),
      'utf8',
    );

    const config = loadAppConfig(filePath);
    expect(config).toEqual({
      systemInstruction: 'Answer briefly.',
      voiceName: 'Puck',
      responseModalities: ['TEXT'],
      googleSearch: false,
      contextWindowCompression: false,
      tools: { allowlist: ['get_current_time'] },
    });

    await fs.rm(filePath, { force: true });
  });

  it('throws on invalid JSON', async () => {
    const filePath = createTempFile('app-config-json');
    await fs.writeFile(filePath, '{ not json', 'utf8');

    expect(() => loadAppConfig(filePath)).toThrow(AppConfigError);

    await fs.rm(filePath, { force: true });
  });

  it('names the offending field when validation fails', async () => {
    const filePath = createTempFile('app-config-invalid');
    await fs.writeFile(filePath, JSON.stringify({ responseModalities: ['VIDEO'] }), 'utf8');

    expect(() => loadAppConfig(filePath)).toThrow(/responseModalities\.0/);

    await fs.rm(filePath, { force: true });
  });
});
