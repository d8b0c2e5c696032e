import logger from '../config/logger.js';

/**
 * Post-hoc record of one completed request
 */
export interface UsageRecord {
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  /** Unix timestamp in milliseconds */
  timestamp: number;
}

/**
 * Write-only sink the gateway reports completed requests to
 */
export interface UsageSink {
  record(record: UsageRecord): void;
}

export interface ModelUsage {
  requestCount: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface UsageStats {
  totalRequests: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  byProvider: Record<string, ModelUsage>;
  /** Keyed by `provider:model` */
  byModel: Record<string, ModelUsage>;
  since: number;
}

export class UsageTracker implements UsageSink {
  private totals: ModelUsage;
  private byProvider: Map<string, ModelUsage>;
  private byModel: Map<string, ModelUsage>;
  private since: number;
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.totals = emptyUsage();
    this.byProvider = new Map();
    this.byModel = new Map();
    this.since = now();
  }

  record(record: UsageRecord): void {
    add(this.totals, record);
    add(entry(this.byProvider, record.provider), record);
    add(entry(this.byModel, `${record.provider}:${record.model}`), record);

    logger.info(
      {
        provider: record.provider,
        model: record.model,
        inputTokens: record.inputTokens,
        outputTokens: record.outputTokens,
      },
      'Request usage'
    );
  }

  getStats(): UsageStats {
    return {
      totalRequests: this.totals.requestCount,
      totalInputTokens: this.totals.inputTokens,
      totalOutputTokens: this.totals.outputTokens,
      totalTokens: this.totals.totalTokens,
      byProvider: snapshot(this.byProvider),
      byModel: snapshot(this.byModel),
      since: this.since,
    };
  }

  reset(): void {
    this.totals = emptyUsage();
    this.byProvider = new Map();
    this.byModel = new Map();
    this.since = this.now();
  }
}

function emptyUsage(): ModelUsage {
  return { requestCount: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function entry(map: Map<string, ModelUsage>, key: string): ModelUsage {
  let usage = map.get(key);
  if (!usage) {
    usage = emptyUsage();
    map.set(key, usage);
  }
  return usage;
}

function add(usage: ModelUsage, record: UsageRecord): void {
  usage.requestCount += 1;
  usage.inputTokens += record.inputTokens;
  usage.outputTokens += record.outputTokens;
  usage.totalTokens += record.inputTokens + record.outputTokens;
}

function snapshot(map: Map<string, ModelUsage>): Record<string, ModelUsage> {
  return Object.fromEntries([...map].map(([key, usage]) => [key, { ...usage }]));
}
