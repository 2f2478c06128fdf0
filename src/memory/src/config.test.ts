import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ValidationError } from './errors.js';

describe('loadConfig', () => {
  it('defaults to memory.jsonl in the working directory', () => {
    expect(loadConfig({}, '/srv/app')).toEqual({
      memoryFilePath: '/srv/app/memory.jsonl',
      localStorage: false,
    });
  });

  it('combines the base directory and file name', () => {
    const config = loadConfig(
      { MEMORY_FILE_PATH: '/data/graphs', MEMORY_FILE_NAME: 'team.jsonl' },
      '/srv/app'
    );
    expect(config.memoryFilePath).toBe('/data/graphs/team.jsonl');
  });

  it('resolves a relative base directory against the working directory', () => {
    expect(loadConfig({ MEMORY_FILE_PATH: 'state' }, '/srv/app').memoryFilePath).toBe(
      '/srv/app/state/memory.jsonl'
    );
  });

  it('ignores the base directory when local storage is on', () => {
    const config = loadConfig(
      { MEMORY_FILE_PATH: '/data/graphs', LOCAL_STORAGE: 'TRUE' },
      '/srv/app'
    );
    expect(config).toEqual({ memoryFilePath: '/srv/app/memory.jsonl', localStorage: true });
  });

  it('treats any other LOCAL_STORAGE value as off', () => {
    expect(loadConfig({ LOCAL_STORAGE: 'yes' }, '/srv/app').localStorage).toBe(false);
  });

  it('rejects an empty file name', () => {
    expect(() => loadConfig({ MEMORY_FILE_NAME: '' }, '/srv/app')).toThrow(ValidationError);
  });
});
