import Fastify, { type FastifyError } from 'fastify';
import websocket from '@fastify/websocket';
import cors from '@fastify/cors';
import { WebSocket } from 'ws';
import { ZodError } from 'zod';
import { SimulationError } from '@shared/engine/errors.ts';
import { diffRoadSnapshots } from '@shared/engine/stateDiff.ts';
import { PROTOCOL_VERSION, type ServerMessage } from '@shared/types/protocol.types.ts';
import type { RoadSnapshot } from '@shared/types/simulation.types.ts';
import { AppError, fromSimulationError } from './errors.js';
import { websocketLogger } from './logging/index.js';
import { SimulationTelemetry } from './observability/SimulationTelemetry.js';
import { StateHistory } from './observability/StateHistory.js';
import { crashBodySchema, stateHistoryQuerySchema } from './schemas/simulation.schema.js';
import { SimulationLoop } from './simulation/SimulationLoop.js';
import { TrafficSimulation, type TrafficSimulationOptions } from './simulation/TrafficSimulation.js';

export interface BuildOptions {
  logger?: boolean;
  tickRate?: number;
  simulation?: TrafficSimulationOptions;
}

declare module 'fastify' {
  interface FastifyInstance {
    simulation: TrafficSimulation;
    simulationLoop: SimulationLoop;
    telemetry: SimulationTelemetry;
    stateHistory: StateHistory;
  }
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

const HEARTBEAT_INTERVAL_MS = 15000;
const METRICS_LOG_INTERVAL_MS = 10000;

export async function buildServer(options: BuildOptions = {}) {
  const fastify = Fastify({
    logger: options.logger ?? true
  });

  await fastify.register(cors, { origin: true });
  await fastify.register(websocket);

  const simulation = new TrafficSimulation(options.simulation);
  const simulationLoop = new SimulationLoop(simulation, { tickRate: options.tickRate });
  const telemetry = new SimulationTelemetry();
  const stateHistory = new StateHistory();
  fastify.decorate('simulation', simulation);
  fastify.decorate('simulationLoop', simulationLoop);
  fastify.decorate('telemetry', telemetry);
  fastify.decorate('stateHistory', stateHistory);

  const clients = new Set<WebSocket>();
  let heartbeatTimer: NodeJS.Timeout | null = null;
  let metricsLogTimer: NodeJS.Timeout | null = null;
  let lastBroadcastSnapshot: RoadSnapshot | null = null;

  const sendMessage = (socket: WebSocket, message: ServerMessage) => {
    if (socket.readyState !== WebSocket.OPEN) {
      clients.delete(socket);
      return;
    }
    try {
      socket.send(JSON.stringify(message));
    } catch (error) {
      fastify.log.warn({ err: error }, 'Failed to send message to client');
      clients.delete(socket);
    }
  };

  const broadcast = (message: ServerMessage) => {
    const payload = JSON.stringify(message);
    for (const socket of clients) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(payload);
      } else {
        clients.delete(socket);
      }
    }
    return Buffer.byteLength(payload, 'utf8');
  };

  const ensureHeartbeat = () => {
    if (heartbeatTimer) return;
    heartbeatTimer = setInterval(() => {
      if (clients.size === 0) {
        return;
      }
      broadcast({
        type: 'heartbeat',
        payload: {
          serverTime: Date.now(),
          tick: simulationLoop.getLatestSnapshot().tick,
        }
      });
    }, HEARTBEAT_INTERVAL_MS);
  };

  const stopHeartbeat = () => {
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer);
      heartbeatTimer = null;
    }
  };

  const startMetricsLogger = () => {
    if (metricsLogTimer) return;
    metricsLogTimer = setInterval(() => {
      const summary = telemetry.getSummary();
      if (!summary.lastSample) return;
      fastify.log.debug({
        metrics: {
          avgTickMs: Number(summary.avgTickMs.toFixed(3)),
          p95TickMs: Number(summary.p95TickMs.toFixed(3)),
          avgDeltaBytes: Math.round(summary.avgDeltaBytes),
          avgLaneChanges: Number(summary.avgLaneChanges.toFixed(2)),
          lastTick: summary.lastSample.tick,
          connectedClients: clients.size,
        }
      }, 'simulation metrics');
    }, METRICS_LOG_INTERVAL_MS);
  };

  const stopMetricsLogger = () => {
    if (metricsLogTimer) {
      clearInterval(metricsLogTimer);
      metricsLogTimer = null;
    }
  };

  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const failure = error instanceof SimulationError ? fromSimulationError(error) : error;
    const response: ErrorResponse = {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    };
    let statusCode = 500;

    if (failure instanceof ZodError) {
      statusCode = 400;
      response.error.code = 'VALIDATION_ERROR';
      response.error.message = 'Validation failed';
      response.error.details = failure.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
    } else if (failure instanceof AppError) {
      statusCode = failure.statusCode;
      response.error.code = failure.code;
      response.error.message = failure.message;
    } else if ('statusCode' in failure && typeof failure.statusCode === 'number' && failure.statusCode < 500) {
      // Fastify's own client errors (bad JSON, unsupported media type, ...)
      statusCode = failure.statusCode;
      response.error.code = 'code' in failure && typeof failure.code === 'string' ? failure.code : 'BAD_REQUEST';
      response.error.message = failure.message;
    }

    if (statusCode >= 500) {
      fastify.log.error({ err: error, method: request.method, url: request.url }, 'Request failed');
    }
    void reply.status(statusCode).send(response);
  });

  fastify.get('/health', async () => {
    const snapshot = simulationLoop.getLatestSnapshot();
    return {
      status: 'ok',
      tick: snapshot.tick,
      cars: simulation.road.carCount(),
    };
  });

  fastify.get('/snapshot', async () => simulationLoop.getLatestSnapshot());

  fastify.get('/metrics/traffic', async () => simulation.metrics());

  fastify.get('/simulation/status', async () => ({
    running: simulationLoop.isRunning,
    mode: simulation.mode,
    tick: simulation.road.tickCount,
    lastTick: simulation.getLastSummary(),
  }));

  fastify.post('/simulation/start', async () => {
    simulationLoop.start();
    return { running: simulationLoop.isRunning };
  });

  fastify.post('/simulation/stop', async () => {
    simulationLoop.stop();
    return { running: simulationLoop.isRunning };
  });

  fastify.post('/crash', async (request) => {
    const { lane } = crashBodySchema.parse(request.body);
    return simulation.crash(lane);
  });

  fastify.get('/analytics/metrics', async () => ({
    ...telemetry.getSummary(),
    connectedClients: clients.size,
  }));

  fastify.get('/analytics/state-history', async (request) => {
    const { limit, summaryOnly } = stateHistoryQuerySchema.parse(request.query);
    const snapshots = stateHistory.getRecent(limit);

    if (summaryOnly) {
      return snapshots.map(snapshot => ({
        tick: snapshot.tick,
        timestamp: snapshot.timestamp,
        laneCounts: snapshot.laneCounts,
      }));
    }

    return snapshots;
  });

  fastify.get('/ws/state', { websocket: true }, (socket, req) => {
    websocketLogger.info('WebSocket client connected', { ip: req.ip });
    clients.add(socket);
    ensureHeartbeat();

    const initial = simulationLoop.getLatestSnapshot();
    sendMessage(socket, {
      type: 'handshake',
      payload: {
        protocolVersion: PROTOCOL_VERSION,
        serverTime: Date.now(),
        numLanes: initial.numLanes,
        length: initial.length,
      }
    });
    sendMessage(socket, { type: 'snapshot', payload: initial });
    if (!lastBroadcastSnapshot) {
      lastBroadcastSnapshot = initial;
    }

    const detach = () => {
      clients.delete(socket);
      if (clients.size === 0) {
        stopHeartbeat();
      }
    };

    socket.on('close', detach);
    socket.on('error', (error: Error) => {
      websocketLogger.logError('WebSocket client error', error);
      detach();
    });
  });

  simulationLoop.onTickMetrics((metrics) => {
    telemetry.noteTickMetrics(metrics);
  });

  simulationLoop.onSnapshot((snapshot) => {
    stateHistory.record(snapshot);

    if (clients.size === 0) {
      lastBroadcastSnapshot = snapshot;
      return;
    }

    const delta = diffRoadSnapshots(lastBroadcastSnapshot, snapshot);
    lastBroadcastSnapshot = snapshot;
    const bytes = broadcast({ type: 'state-update', payload: delta });
    telemetry.noteBroadcast(snapshot.tick, bytes);
  });

  simulation.onCrash((event) => {
    if (clients.size > 0) {
      broadcast({ type: 'crash', payload: event });
    }
  });

  fastify.addHook('onClose', async () => {
    simulationLoop.stop();
    stopHeartbeat();
    stopMetricsLogger();

    // 1001 = "Going Away"
    for (const socket of clients) {
      socket.close(1001, 'Server shutting down');
    }
    clients.clear();
  });

  startMetricsLogger();

  return fastify;
}
