import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadTopics } from '../topics.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadTopics', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'topics-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('keeps topics in declaration order', async () => {
    const path = join(dir, 'topics.json');
    await writeFile(path, '{"markets": ["stocks", "bond"], "energy": ["oil", "opec"]}', 'utf-8');

    const topics = await loadTopics(path);

    expect([...topics.keys()]).toEqual(['markets', 'energy']);
    expect(topics.get('energy')).toEqual(['oil', 'opec']);
  });

  it('treats a missing file as no topics', async () => {
    const topics = await loadTopics(join(dir, 'absent.json'));
    expect(topics.size).toBe(0);
  });

  it('rejects documents that are not topic to keyword lists', async () => {
    const path = join(dir, 'topics.json');
    await writeFile(path, '{"energy": "oil"}', 'utf-8');

    await expect(loadTopics(path)).rejects.toBeInstanceOf(ConfigError);
  });
});
