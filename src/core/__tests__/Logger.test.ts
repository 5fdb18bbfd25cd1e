import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '../Logger';

async function readLines(file: string): Promise<Array<Record<string, unknown>>> {
  const text = await fs.readFile(file, 'utf8').catch(() => '');
  return text.split('\n').filter(line => line.length > 0).map(line => JSON.parse(line));
}

describe('Logger', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'logger-test-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('writes errors with their details to error.log', async () => {
    const logger = new Logger({ directory });

    logger.error('Catalog fetch failed', new Error('socket hang up'), { url: 'https://catalog.test/models' });

    await vi.waitFor(async () => {
      const [entry] = await readLines(path.join(directory, 'error.log'));
      expect(entry).toMatchObject({
        level: 'error',
        message: 'Catalog fetch failed',
        service: 'flight-challenges',
        url: 'https://catalog.test/models',
        error: { message: 'socket hang up', name: 'Error' }
      });
    });
  });

  it('keeps entries below the configured level out of combined.log', async () => {
    const logger = new Logger({ level: 'info', directory });

    logger.debug('Challenge parsed', { rule: 'route' });
    logger.warn('Some flight records were rejected', { rejected: 2 });
    logger.info('Flight batch evaluated', { scanned: 6 });

    await vi.waitFor(async () => {
      const entries = await readLines(path.join(directory, 'combined.log'));
      expect(entries.map(entry => [entry.level, entry.message])).toEqual([
        ['warn', 'Some flight records were rejected'],
        ['info', 'Flight batch evaluated']
      ]);
    });
  });
});
