import 'dotenv/config';
import http from 'http';
import path from 'path';
import { createApp } from './app';
import { ChatService } from './chat/service';
import { loadConfig, type AppConfig } from './config';
import { StaticCrisisResponder } from './engine/crisis';
import { createDialogueEngine } from './engine/dialogue';
import { loadLexicon, loadTemplateLibrary, missingTemplateKeys } from './engine/resources';
import { TEMPLATE_KEYS } from './engine/types';
import { FileHistoryLog } from './lib/history';
import { configureLogging, errorPayload, logEvent } from './lib/logging';
import { FileSessionStore, MemorySessionStore, type SessionStore } from './lib/sessions';
import { TokenRegistry } from './lib/tokens';
import { FileUserRegistry } from './lib/users';
import { attachChatSocket } from './ws/chatSocket';

function sessionStoreFor(config: AppConfig): SessionStore {
  return config.sessionStore === 'file'
    ? new FileSessionStore(path.join(config.dataDir, 'sessions'))
    : new MemorySessionStore();
}

async function main() {
  const config = loadConfig();
  configureLogging({ dir: config.logDir, echo: config.logEcho });

  const library = loadTemplateLibrary(config.resourcesDir);
  const lexicon = loadLexicon(config.resourcesDir);
  for (const key of missingTemplateKeys(library)) {
    await logEvent({ type: 'templates.missing', level: 'warn', payload: { key } });
  }

  const engine = createDialogueEngine({
    library,
    lexicon,
    crisis: new StaticCrisisResponder(config.crisisMessage),
  });
  const service = new ChatService({
    engine,
    sessions: sessionStoreFor(config),
    history: new FileHistoryLog(path.join(config.dataDir, 'history'), config.historyLimit),
    users: new FileUserRegistry(config.dataDir),
    tokens: new TokenRegistry(config.tokenTtlMs),
  });

  const loadedKeys = TEMPLATE_KEYS.length - missingTemplateKeys(library).length;
  const app = createApp(service, { templateKeys: () => loadedKeys });
  const server = http.createServer(app);
  attachChatSocket(server, service);

  server.listen(config.port, () => {
    console.log(`Server listening on http://localhost:${config.port}`);
  });
  await logEvent({
    type: 'server.start',
    payload: { port: config.port, sessionStore: config.sessionStore, dataDir: config.dataDir },
  });
}

main().catch(async (err: unknown) => {
  console.error(err);
  await logEvent({ type: 'server.fatal', level: 'error', payload: errorPayload(err) }).catch((logErr: unknown) => {
    console.error('log write failed', logErr);
  });
  process.exitCode = 1;
});
