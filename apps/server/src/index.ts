// apps/server/src/index.ts
//
// Boot: read configuration, load the dictionary once, start listening.
//
// The dictionary is read-only after this point and shared by every session.
// A dictionary that cannot be loaded stops the process; the server never
// runs on an empty word list.

import 'dotenv/config';
import { pino } from 'pino';
import { loadWordList } from '@wordhint/solver-core';
import { createApp } from './app.js';
import { loadConfig, type ServerConfig } from './config.js';
import { SessionStore } from './sessions.js';

let config: ServerConfig;
try {
  config = loadConfig();
} catch (err) {
  pino().fatal({ err }, 'invalid configuration');
  process.exit(1);
}

const log = pino({ level: config.logLevel });

let store: SessionStore;
try {
  const source = await loadWordList(config.dictionaryFile);
  log.info({ file: config.dictionaryFile, words: source.size }, 'dictionary loaded');
  store = new SessionStore(
    source,
    { narrowGuessPool: config.narrowGuessPool, maxSessions: config.maxSessions },
    log,
  );
} catch (err) {
  log.fatal({ err }, 'dictionary load failed');
  process.exit(1);
}

const app = createApp(store, log);
app.listen(config.port, config.host, () =>
  log.info({ port: config.port, host: config.host }, 'server up'),
);
