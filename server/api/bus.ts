/**
 * Bus API Routes
 * REST surface over the driver-facing transport operations
 */

import path from 'path';
import { Router, type Response } from 'express';
import type { GpibTransport, ControllerInfo, BusAddress } from '../gpib/types.js';
import type {
  ApiError,
  BusDevicesResponse,
  ControllerListResponse,
  HealthResponse,
  SaveFileResponse,
  TextResponse,
} from '../../shared/types.js';
import { parseBusAddress } from '../gpib/address.js';
import { ConnectionFault, FileIOError, TransportError, type GpibError } from '../gpib/errors.js';

export interface BusRoutesOptions {
  /** Directory saveFile() writes into; only bare filenames are accepted */
  fileDirectory: string;
  findControllers: () => Promise<ControllerInfo[]>;
}

function sendError(res: Response, err: GpibError): void {
  let status = 502;
  let body: ApiError = { error: 'BUS_ERROR', message: err.message };

  if (err instanceof TransportError && err.code === 'invalid_address') {
    status = 400;
    body = { error: 'INVALID_ADDRESS', message: err.message };
  } else if (err instanceof TransportError && err.isTimeout) {
    status = 504;
    body = { error: 'TIMEOUT', message: err.message };
  } else if (err instanceof ConnectionFault) {
    status = 503;
    body = { error: 'CONNECTION_FAULT', message: err.message };
  } else if (err instanceof FileIOError) {
    status = 500;
    body = { error: 'FILE_IO', message: err.message };
  }

  res.status(status).json(body);
}

function sendBadRequest(res: Response, message: string): void {
  const body: ApiError = { error: 'INVALID_REQUEST', message };
  res.status(400).json(body);
}

function readCommand(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('command' in body)) return null;
  return typeof body.command === 'string' && body.command.length > 0 ? body.command : null;
}

function parseMode(raw: unknown): boolean | undefined | null {
  if (raw === undefined) return undefined;
  if (raw === true || raw === 'true') return true;
  if (raw === false || raw === 'false') return false;
  return null;
}

export function createBusRoutes(transport: GpibTransport, options: BusRoutesOptions): Router {
  const router = Router();

  // Resolve :address or answer 400
  function addressOf(raw: string, res: Response): BusAddress | null {
    const parsed = parseBusAddress(raw);
    if (!parsed.ok) {
      sendError(res, parsed.error);
      return null;
    }
    return parsed.value;
  }

  // GET /health
  router.get('/health', (_req, res) => {
    const body: HealthResponse = {
      status: 'ok',
      adapter: transport.kind,
      connection: transport.isOpen() ? 'open' : 'closed',
    };
    res.json(body);
  });

  // GET /bus/devices - Scan the bus
  router.get('/bus/devices', async (_req, res) => {
    const result = await transport.discover();
    if (!result.ok) return sendError(res, result.error);
    const body: BusDevicesResponse = { adapter: transport.kind, addresses: result.value };
    res.json(body);
  });

  // POST /bus/open - Reconnect; the only way out of a faulted connection
  router.post('/bus/open', async (_req, res) => {
    const result = await transport.open();
    if (!result.ok) return sendError(res, result.error);
    res.status(204).end();
  });

  // POST /bus/:address/write - { command }
  router.post('/bus/:address/write', async (req, res) => {
    const address = addressOf(req.params.address, res);
    if (address === null) return;
    const command = readCommand(req.body);
    if (command === null) return sendBadRequest(res, 'body.command must be a non-empty string');

    const result = await transport.write(address, command);
    if (!result.ok) return sendError(res, result.error);
    res.status(204).end();
  });

  // POST /bus/:address/query - { command } -> { response }
  router.post('/bus/:address/query', async (req, res) => {
    const address = addressOf(req.params.address, res);
    if (address === null) return;
    const command = readCommand(req.body);
    if (command === null) return sendBadRequest(res, 'body.command must be a non-empty string');

    const result = await transport.query(address, command);
    if (!result.ok) return sendError(res, result.error);
    const body: TextResponse = { response: result.value };
    res.json(body);
  });

  // GET /bus/:address/read -> { response }
  router.get('/bus/:address/read', async (req, res) => {
    const address = addressOf(req.params.address, res);
    if (address === null) return;

    const result = await transport.readText(address);
    if (!result.ok) return sendError(res, result.error);
    const body: TextResponse = { response: result.value };
    res.json(body);
  });

  // GET /bus/:address/binary?mode=true|false -> raw bytes
  router.get('/bus/:address/binary', async (req, res) => {
    const address = addressOf(req.params.address, res);
    if (address === null) return;
    const mode = parseMode(req.query.mode);
    if (mode === null) return sendBadRequest(res, 'mode must be "true" or "false"');

    const result = await transport.readBinary(address, mode);
    if (!result.ok) return sendError(res, result.error);
    res.type('application/octet-stream').send(result.value);
  });

  // POST /bus/:address/file - { filename, mode } -> { path, bytesWritten }
  router.post('/bus/:address/file', async (req, res) => {
    const address = addressOf(req.params.address, res);
    if (address === null) return;

    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('filename' in body) || typeof body.filename !== 'string') {
      return sendBadRequest(res, 'body.filename must be a string');
    }
    const filename = body.filename;
    if (filename === '' || path.basename(filename) !== filename || filename === '.' || filename === '..') {
      return sendBadRequest(res, 'filename must be a bare file name');
    }
    const mode = parseMode('mode' in body ? body.mode : undefined);
    if (mode === null) return sendBadRequest(res, 'mode must be a boolean');

    const destination = path.join(options.fileDirectory, filename);
    const result = await transport.saveFile(address, mode ?? false, destination);
    if (!result.ok) return sendError(res, result.error);
    const response: SaveFileResponse = { path: destination, bytesWritten: result.value };
    res.status(201).json(response);
  });

  // GET /controllers - NetFinder broadcast
  router.get('/controllers', async (_req, res) => {
    let controllers: ControllerInfo[];
    try {
      controllers = await options.findControllers();
    } catch (err) {
      const error: ApiError = {
        error: 'BUS_ERROR',
        message: err instanceof Error ? err.message : 'Unknown error',
      };
      res.status(500).json(error);
      return;
    }
    const body: ControllerListResponse = {
      controllers: controllers.map(c => ({
        ipAddress: c.ipAddress,
        macAddress: c.macAddress,
        name: c.name,
        appVersion: c.appVersion,
      })),
    };
    res.json(body);
  });

  return router;
}
