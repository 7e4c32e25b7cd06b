/**
 * @fileoverview Main entry point for the filament ledger server
 *
 * Key responsibilities:
 * - Parse command-line arguments and resolve the data directory
 * - Load process configuration (CLI flags override it for this run only)
 * - Open the inventory file and wire the ledger services
 * - Seed the material color registry and the settings record on first start
 * - Start the HTTP API
 * - Handle graceful shutdown on SIGINT/SIGTERM
 */

import { getConfigManager } from './managers/ConfigManager';
import { InventoryServer } from './server/InventoryServer';
import { createLedgerServices } from './services/createLedgerServices';
import { RecognitionService } from './services/RecognitionService';
import { FileInventoryStore } from './store/FileInventoryStore';
import { parseCliArguments, validateCliOptions } from './utils/CliArguments';
import { logError, logInfo, setVerboseLogging } from './utils/logging';
import { initializeDataDirectory, setDataPath } from './utils/setup';

const NAMESPACE = 'Main';

let server: InventoryServer | null = null;
let store: FileInventoryStore | null = null;
let isShuttingDown = false;

/**
 * Setup signal handlers for graceful shutdown
 */
function setupSignalHandlers(): void {
  const handle = (signal: NodeJS.Signals): void => {
    logInfo('Shutdown', `Received ${signal}`);
    shutdown().then(() => {
      process.exit(0);
    }).catch((error: unknown) => {
      logError('Shutdown', 'Error during shutdown', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', handle);
  process.on('SIGTERM', handle);
}

/**
 * Stop accepting requests, wait for queued inventory writes and flush the config
 */
async function shutdown(): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (server) {
    await server.stop();
  }
  if (store) {
    await store.flush();
    logInfo('Shutdown', 'Inventory writes flushed');
  }
  await getConfigManager().dispose();
  logInfo('Shutdown', 'Graceful shutdown complete');
}

async function main(): Promise<void> {
  const options = parseCliArguments();
  const validation = validateCliOptions(options);
  if (!validation.valid) {
    validation.errors.forEach(error => logError(NAMESPACE, error));
    process.exit(1);
  }

  if (options.debug) {
    setVerboseLogging(true);
  }
  if (options.dataDir) {
    setDataPath(options.dataDir);
  }

  const dataPath = initializeDataDirectory();

  // Created after setDataPath so config.json lands in the chosen directory
  const config = getConfigManager();
  await config.load();
  const settings = config.getConfig();
  setVerboseLogging(options.debug || settings.DebugMode);

  const port = options.port ?? settings.ServerPort;
  const host = options.host ?? settings.ServerHost;
  const recognitionUrl = options.recognitionUrl ?? settings.RecognitionServiceUrl;

  store = await FileInventoryStore.open(dataPath);
  logInfo(NAMESPACE, `Inventory file: ${store.getFilePath()}`);

  const services = createLedgerServices(store, {
    recognition: recognitionUrl
      ? new RecognitionService(recognitionUrl, settings.RecognitionTimeoutMs)
      : null
  });
  if (services.recognition) {
    logInfo(NAMESPACE, `Label recognition via ${services.recognition.getEndpoint()}`);
  }

  if (await services.registry.ensureSeeded()) {
    logInfo(NAMESPACE, 'Seeded default material colors');
  }
  await services.settings.get();

  setupSignalHandlers();

  server = new InventoryServer(services);
  await server.start(port, host);
}

main().catch((error: unknown) => {
  logError(NAMESPACE, 'Failed to start', error);
  process.exit(1);
});
