/**
 * ABOUTME: Usage extraction for agent output.
 * Agent CLIs that print JSON (a single document or JSONL events) often report
 * cost and token counts; this pulls those numbers out into one summary.
 */

/**
 * Usage reported by one invocation.
 */
export interface UsageSummary {
  /** Cost in USD: the last cumulative total reported, else the sum of per-event costs */
  costUsd?: number;
  inputTokens: number;
  outputTokens: number;
  /** Number of JSON events that carried usage data */
  events: number;
}

type JsonRecord = Record<string, unknown>;

const TOTAL_COST_KEYS = ['total_cost_usd', 'totalCostUsd', 'totalUSD'] as const;
const EVENT_COST_KEYS = ['cost_usd', 'costUsd', 'costUSD'] as const;

const TOKEN_INPUT_KEYS = [
  'inputTokens',
  'input_tokens',
  'promptTokens',
  'prompt_tokens',
] as const;

const TOKEN_OUTPUT_KEYS = [
  'outputTokens',
  'output_tokens',
  'completionTokens',
  'completion_tokens',
] as const;

const USAGE_NESTED_KEYS = ['usage', 'cost', 'stats', 'result'] as const;

function asRecord(value: unknown): JsonRecord | null {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}

function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function readFirstNumber(record: JsonRecord, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = readNumber(record[key]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

interface UsageSample {
  totalCost?: number;
  eventCost?: number;
  inputTokens?: number;
  outputTokens?: number;
}

function sampleFrom(record: JsonRecord, depth = 0): UsageSample {
  const sample: UsageSample = {
    totalCost: readFirstNumber(record, TOTAL_COST_KEYS),
    eventCost: readFirstNumber(record, EVENT_COST_KEYS),
    inputTokens: readFirstNumber(record, TOKEN_INPUT_KEYS),
    outputTokens: readFirstNumber(record, TOKEN_OUTPUT_KEYS),
  };
  if (depth >= 2) return sample;

  for (const key of USAGE_NESTED_KEYS) {
    const nested = asRecord(record[key]);
    if (!nested) continue;
    const inner = sampleFrom(nested, depth + 1);
    sample.totalCost ??= inner.totalCost;
    sample.eventCost ??= inner.eventCost;
    sample.inputTokens ??= inner.inputTokens;
    sample.outputTokens ??= inner.outputTokens;
  }
  return sample;
}

function parseJsonObjects(output: string): JsonRecord[] {
  const parse = (text: string): JsonRecord | null => {
    try {
      return asRecord(JSON.parse(text));
    } catch {
      return null;
    }
  };

  const trimmed = output.trim();
  if (trimmed.startsWith('{')) {
    const whole = parse(trimmed);
    if (whole) return [whole];
  }

  const objects: JsonRecord[] = [];
  for (const line of output.split(/\r?\n/)) {
    const candidate = line.trim();
    if (!candidate.startsWith('{')) continue;
    const parsed = parse(candidate);
    if (parsed) objects.push(parsed);
  }
  return objects;
}

/**
 * Extract usage from agent stdout. Returns undefined when nothing was reported.
 */
export function extractUsage(output: string): UsageSummary | undefined {
  let lastTotal: number | undefined;
  let eventCostSum: number | undefined;
  const summary: UsageSummary = { inputTokens: 0, outputTokens: 0, events: 0 };

  for (const record of parseJsonObjects(output)) {
    const sample = sampleFrom(record);
    const hasData =
      sample.totalCost !== undefined ||
      sample.eventCost !== undefined ||
      sample.inputTokens !== undefined ||
      sample.outputTokens !== undefined;
    if (!hasData) continue;

    summary.events++;
    if (sample.totalCost !== undefined) lastTotal = sample.totalCost;
    if (sample.eventCost !== undefined) eventCostSum = (eventCostSum ?? 0) + sample.eventCost;
    summary.inputTokens += sample.inputTokens ?? 0;
    summary.outputTokens += sample.outputTokens ?? 0;
  }

  if (summary.events === 0) return undefined;
  const costUsd = lastTotal ?? eventCostSum;
  return costUsd !== undefined ? { ...summary, costUsd } : summary;
}
