/**
 * GPIB Bridge Server
 * Express server exposing one GPIB controller (USB or Ethernet) over REST
 */

import { createServer } from 'http';
import { mkdirSync } from 'fs';
import express from 'express';
import cors from 'cors';
import { loadConfig, type ServerConfig } from './config.js';
import { createBusRoutes } from './api/bus.js';
import type { GpibResult, GpibTransport } from './gpib/types.js';
import { Ok } from '../shared/types.js';
import { createLocalControllerTransport } from './gpib/transports/local-controller.js';
import { createNetworkControllerTransport } from './gpib/transports/network-controller.js';
import { loadLocalControllerLibrary } from './gpib/transports/ug01-library.js';
import { discoverControllers, findFirstController } from './gpib/netfinder.js';

async function createTransport(config: ServerConfig): Promise<GpibResult<GpibTransport>> {
  if (config.adapter === 'local' && config.libraryPath) {
    const library = loadLocalControllerLibrary(config.libraryPath);
    return Ok(createLocalControllerTransport(library, {
      fileTransfer: config.fileTransfer,
      fileDirectory: config.fileDirectory,
      encoding: config.encoding,
      trace: config.trace,
    }));
  }

  let host = config.host;
  if (!host) {
    console.log('No GPIB_HOST set, looking for a controller on the network...');
    const found = await findFirstController({ timeoutMs: config.discoveryTimeoutMs });
    if (!found.ok) return found;
    host = found.value;
    console.log(`  Using controller at ${host}`);
  }

  return Ok(createNetworkControllerTransport({
    host,
    port: config.controllerPort,
    timeoutMs: config.timeoutMs,
    fileDirectory: config.fileDirectory,
    encoding: config.encoding,
    trace: config.trace,
  }));
}

async function start(): Promise<void> {
  const loaded = loadConfig();
  if (!loaded.ok) {
    console.error(`Invalid configuration: ${loaded.error}`);
    process.exit(1);
  }
  const config = loaded.value;

  console.log('GPIB Bridge Server starting...');
  console.log(`  Adapter: ${config.adapter}`);
  console.log(`  Read timeout: ${config.timeoutMs}ms`);
  console.log(`  File directory: ${config.fileDirectory}`);
  console.log('');

  mkdirSync(config.fileDirectory, { recursive: true });

  const created = await createTransport(config);
  if (!created.ok) {
    console.error(`Failed to set up the GPIB controller: ${created.error.message}`);
    process.exit(1);
  }
  const transport = created.value;

  const opened = await transport.open();
  if (!opened.ok) {
    // Not fatal: requests report the fault until POST /api/bus/open succeeds
    console.error(`Controller not reachable yet: ${opened.error.message}`);
  }

  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use('/api', createBusRoutes(transport, {
    fileDirectory: config.fileDirectory,
    findControllers: () => discoverControllers({ timeoutMs: config.discoveryTimeoutMs }),
  }));

  const server = createServer(app);

  server.listen(config.port, () => {
    console.log('');
    console.log(`Server running on http://localhost:${config.port}`);
    console.log('');
    console.log('REST API endpoints:');
    console.log('  GET  /api/health                - Adapter and connection state');
    console.log('  GET  /api/bus/devices           - Scan the bus');
    console.log('  POST /api/bus/open              - Reconnect to the controller');
    console.log('  POST /api/bus/:address/write    - Send a command');
    console.log('  POST /api/bus/:address/query    - Send a command and read the reply');
    console.log('  GET  /api/bus/:address/read     - Read a text response');
    console.log('  GET  /api/bus/:address/binary   - Read a binary block');
    console.log('  POST /api/bus/:address/file     - Save a binary payload to disk');
    console.log('  GET  /api/controllers           - Find controllers on the network');
  });

  // Graceful shutdown
  const shutdown = (): void => {
    console.log('Shutting down...');
    transport.close().then(() => {
      server.close(() => {
        console.log('Server closed');
        process.exit(0);
      });
    }, (err: unknown) => {
      console.error('Failed to close controller:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

start().catch(err => {
  console.error('Server failed to start:', err);
  process.exit(1);
});
