#!/usr/bin/env node
import { appConfig } from './config';
import { logger, logError, logWarning } from './utils/logger';
import { createPlaylistContext } from './services/playlist/context';
import { Playlist } from './services/playlist/Playlist';

const main = async (): Promise<number> => {
  const input = process.argv[2];
  if (!input) {
    process.stderr.write('Usage: playlist-harvester <playlist url or id>\n');
    return 2;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted by SIGINT')));

  const context = createPlaylistContext(appConfig);
  const result = await Playlist.build(input, context, { signal: controller.signal });
  const { playlist } = result;

  if (playlist.title) process.stdout.write(`# ${playlist.title}\n`);
  for (const entry of playlist) {
    process.stdout.write(`${entry.url}\t${entry.title}\n`);
  }

  if (result.status === 'interrupted') {
    logWarning('playlist_incomplete', { id: playlist.id, entries: playlist.length, error: result.error.message });
    return 1;
  }
  return 0;
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError('playlist_harvester_failed', error instanceof Error ? error : undefined);
    process.exitCode = 1;
  })
  .finally(() => {
    logger.end();
  });
