import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  modelLatency: LatencySummary;
  stageLatency: Record<string, LatencySummary>;
  outcomes: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createState = (): MetricsState => ({
  requestLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  modelLatency: createLatencySummary(),
  stageLatency: {},
  outcomes: {},
  errorRates: {}
});

let state: MetricsState = createState();

const REQUEST_START_TIME = Symbol("request_start_time");

type TimedRequest = FastifyRequest & { [REQUEST_START_TIME]?: number };

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordModelLatency = (durationMs: number): void => {
  recordLatency(state.modelLatency, durationMs);
};

export const recordStageLatency = (stage: string, durationMs: number): void => {
  const summary = state.stageLatency[stage] ?? createLatencySummary();
  state.stageLatency[stage] = summary;
  recordLatency(summary, durationMs);
};

export const recordPipelineOutcome = (status: string): void => {
  state.outcomes[status] = (state.outcomes[status] ?? 0) + 1;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  model_latency: serializeLatency(state.modelLatency),
  stage_latency: Object.fromEntries(
    Object.entries(state.stageLatency).map(([stage, summary]) => [stage, serializeLatency(summary)])
  ),
  outcomes: { ...state.outcomes },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state = createState();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: TimedRequest, reply: FastifyReply) => {
    request[REQUEST_START_TIME] = Date.now();
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: TimedRequest, reply: FastifyReply) => {
    const startedAt = request[REQUEST_START_TIME] ?? Date.now();
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
