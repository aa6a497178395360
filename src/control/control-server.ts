// src/control/control-server.ts

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import Logger from '../logger.js';
import { DuplicateKeyError, NotConnectedError, ValidationError } from '../errors.js';
import { MassFailCode } from '../constants/constants.js';
import { parseRequest } from '../functions/function-handler.js';
import { cpuTempSchema, signalSchema } from '../functions/configuration.js';
import { MassDeviceEmulator } from '../device-emulator/device-emulator.js';
import { Envelope, JsonValue, LoggerInstance } from '../types/mass-types.js';

export interface ControlServerOptions {
  emulator: MassDeviceEmulator;
  host?: string;
  port?: number;
  /** Broker address reported by /health */
  broker?: string;
  /** express.json() body limit */
  bodyLimit?: string;
  logger?: Logger;
}

interface RouteResult {
  status: number;
  body: JsonValue;
}

type RouteHandler = (req: Request) => Promise<RouteResult>;

const alarmBodySchema = z.object({
  alarm_type: z.string().default('alarm'),
  level: z.string().default('warning'),
  incident_code: z.number().int(),
  description: z.string(),
  meter_serial: z.string().optional(),
  meter_brand: z.string().optional(),
});

const writeBodySchema = z.object({
  meter_serial: z.string(),
  obis_code: z.string().optional(),
  register: z.string().optional(),
  value: z.union([z.string(), z.number(), z.boolean()]),
});

const relayBodySchema = z.object({
  id: z.number().int().optional(),
  name: z.string().optional(),
  state: z.string(),
});

const meterBodySchema = z.object({
  protocol: z.string().min(1),
  type: z.enum(['electricity', 'water', 'gas']),
  brand: z.string().min(1),
  serialNumber: z.string().min(1),
  serialPort: z.string().min(1),
  initBaud: z.number().int().positive(),
  fixBaud: z.boolean(),
  frame: z.string().min(1),
});

const telemetryBodySchema = z.object({
  signal: signalSchema.optional(),
  cpu_temp: cpuTempSchema.optional(),
});

const TELEMETRY_QUERY_KEYS = ['signal', 'cpu_temp'] as const;

function sent(envelopes: Envelope[]): RouteResult {
  return {
    status: 200,
    body: { status: 'sent', referenceId: envelopes[0]?.referenceId ?? null },
  };
}

/** Parsed JSON body; `{}` when the request carried none */
function bodyOf(req: Request): unknown {
  const body: unknown = req.body;
  return body ?? {};
}

function objectOrEmpty(body: unknown): object {
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? body : {};
}

function isBodyParserError(err: unknown, type: string): boolean {
  return err instanceof Error && 'type' in err && err.type === type;
}

/**
 * HTTP surface for manual triggers and state inspection. Pushes answer 503
 * while the transport is down, invalid bodies 400 and duplicates 409.
 */
export class ControlServer {
  private readonly emulator: MassDeviceEmulator;
  private readonly host: string;
  private readonly port: number;
  private readonly broker: string;
  private readonly logger: LoggerInstance;
  private readonly app: Express;
  private server: Server | null = null;

  constructor(options: ControlServerOptions) {
    this.emulator = options.emulator;
    this.host = options.host ?? '0.0.0.0';
    this.port = options.port ?? 8000;
    this.broker = options.broker ?? '';
    this.logger = (options.logger ?? new Logger()).createLogger('ControlServer');
    this.app = this.createApp(options.bodyLimit ?? '100kb');
  }

  private createApp(bodyLimit: string): Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: bodyLimit }));

    this.route(app, 'get', '/health', () => this.health());
    this.route(app, 'get', '/device/state', () => this.deviceState());
    this.route(app, 'post', '/trigger/heartbeat', async () => sent(await this.emulator.triggerHeartbeat()));
    this.route(app, 'post', '/trigger/alarm', req => this.triggerAlarm(bodyOf(req)));
    this.route(app, 'post', '/trigger/write', req => this.triggerWrite(bodyOf(req)));
    this.route(app, 'post', '/trigger/reset', async req => sent(await this.emulator.triggerReset(bodyOf(req))));
    this.route(app, 'post', '/trigger/relay', req => this.triggerRelay(bodyOf(req)));
    this.route(app, 'post', '/trigger/configuration', async req =>
      sent(await this.emulator.triggerConfiguration(bodyOf(req)))
    );
    this.route(app, 'post', '/device/meter/add', req => this.addMeter(bodyOf(req)));
    this.route(app, 'post', '/device/config', req => this.updateConfig(req));

    app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'not found' });
    });
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const { status, body } = this.errorResponse(err);
      this.logger.warn(`${req.method} ${req.path} -> ${status}`, { status });
      res.status(status).json(body);
    });
    return app;
  }

  /**
   * Mounts one route; other methods on the same path answer 405.
   */
  private route(app: Express, method: 'get' | 'post', path: string, handler: RouteHandler): void {
    const run = (req: Request, res: Response, next: NextFunction): void => {
      handler(req).then(result => {
        res.status(result.status).json(result.body);
      }, next);
    };
    const chain = app.route(path);
    if (method === 'get') chain.get(run);
    else chain.post(run);
    chain.all((_req: Request, res: Response) => {
      res.status(405).json({ error: 'method not allowed' });
    });
  }

  /**
   * @returns the bound port
   */
  start(): Promise<number> {
    if (this.server) return Promise.resolve(this.boundPort());

    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        server.off('error', reject);
        server.on('error', err => this.logger.error(`HTTP server error: ${err.message}`));
        const port = this.boundPort();
        this.logger.info(`Control API listening on http://${this.host}:${port}`);
        resolve(port);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private boundPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      const info: AddressInfo = address;
      return info.port;
    }
    return this.port;
  }

  private errorResponse(err: unknown): RouteResult {
    if (isBodyParserError(err, 'entity.parse.failed')) {
      return { status: 400, body: { error: 'body is not valid JSON', failCode: MassFailCode.MALFORMED_REQUEST } };
    }
    if (isBodyParserError(err, 'entity.too.large')) {
      return { status: 413, body: { error: 'body too large', failCode: MassFailCode.MALFORMED_REQUEST } };
    }
    if (err instanceof NotConnectedError) {
      return { status: 503, body: { error: 'MQTT not connected' } };
    }
    if (err instanceof DuplicateKeyError) {
      return { status: 409, body: { error: err.description, failCode: err.failCode } };
    }
    if (err instanceof ValidationError) {
      return { status: 400, body: { error: err.description, failCode: err.failCode } };
    }
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error(`Control request failed: ${message}`);
    return { status: 500, body: { error: message } };
  }

  private async health(): Promise<RouteResult> {
    const snapshot = await this.emulator.getSnapshot();
    return {
      status: 200,
      body: {
        status: 'healthy',
        mqtt_connected: this.emulator.isConnected(),
        device: `${snapshot.identity.flag}/${snapshot.identity.serialNumber}`,
        broker: this.broker,
      },
    };
  }

  private async deviceState(): Promise<RouteResult> {
    const snapshot = await this.emulator.getSnapshot();
    return { status: 200, body: { ...snapshot, connected: this.emulator.isConnected() } };
  }

  private async triggerAlarm(body: unknown): Promise<RouteResult> {
    const alarm = parseRequest(alarmBodySchema, body);
    const request: Record<string, JsonValue> = {
      type: alarm.alarm_type,
      level: alarm.level,
      incidentCode: alarm.incident_code,
      description: alarm.description,
    };
    if (alarm.meter_serial) {
      request.meter = { brand: alarm.meter_brand ?? 'Unknown', serialNumber: alarm.meter_serial };
    }
    return sent(await this.emulator.triggerAlarm(request));
  }

  private async triggerWrite(body: unknown): Promise<RouteResult> {
    const write = parseRequest(writeBodySchema, body);
    return sent(
      await this.emulator.triggerWrite({
        meter: { serialNumber: write.meter_serial },
        obisCode: write.obis_code,
        register: write.register,
        value: write.value,
      })
    );
  }

  private async triggerRelay(body: unknown): Promise<RouteResult> {
    const relay = parseRequest(relayBodySchema, body);
    return sent(await this.emulator.triggerRelay(relay));
  }

  private async addMeter(body: unknown): Promise<RouteResult> {
    const meter = parseRequest(meterBodySchema, body);
    await this.emulator.addMeter(meter);
    return { status: 200, body: { status: 'added' } };
  }

  private async updateConfig(req: Request): Promise<RouteResult> {
    const values: Record<string, unknown> = { ...objectOrEmpty(bodyOf(req)) };
    for (const key of TELEMETRY_QUERY_KEYS) {
      const raw = req.query[key];
      if (raw === undefined) continue;
      if (typeof raw !== 'string' || !/^-?\d+$/.test(raw.trim())) {
        throw new ValidationError(MassFailCode.INVALID_PARAMETER, `${key} must be an integer`);
      }
      values[key] = Number(raw.trim());
    }
    const update = parseRequest(telemetryBodySchema, values);
    if (update.signal === undefined && update.cpu_temp === undefined) {
      throw new ValidationError(MassFailCode.MISSING_PARAMETER, 'signal or cpu_temp is required');
    }
    const fields = await this.emulator.applyTelemetry({ signal: update.signal, cpuTemp: update.cpu_temp });
    return { status: 200, body: { status: 'updated', fields } };
  }
}
