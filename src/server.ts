// Load environment variables FIRST, before any other imports
import { config } from 'dotenv';
import * as path from 'path';

config({ path: path.resolve(__dirname, '..', '.env') });

import { createGateway } from './gateway';
import { loadGatewayConfig, type GatewayConfig } from './gateway-config';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('server');

let gatewayConfig: GatewayConfig;
try {
  gatewayConfig = loadGatewayConfig();
} catch {
  // already logged by the loader
  process.exit(1);
}

setLogLevel(gatewayConfig.server.logLevel);
const gateway = createGateway(gatewayConfig);

gateway.listen().catch((e: unknown) => {
  log.error('Failed to start server:', e instanceof Error ? e.message : String(e));
  process.exit(1);
});

function onSignal(signal: NodeJS.Signals): void {
  log.info(`Received ${signal}`);
  gateway.shutdown().then(
    () => process.exit(0),
    (e: unknown) => {
      log.error('Shutdown failed:', e instanceof Error ? e.message : String(e));
      process.exit(1);
    }
  );
}

process.once('SIGTERM', onSignal);
process.once('SIGINT', onSignal);
