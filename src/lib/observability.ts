import { AsyncLocalStorage } from 'node:async_hooks';
import { channel } from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import type { ScanSummary } from '../config/types.js';

// --- Configuration ---

const TRUE_ENV_VALUES = new Set(['1', 'true', 'yes']);

interface Config {
  enabled: boolean;
  logToolErrors: boolean;
}

function readConfig(): Config {
  return {
    enabled: isTrue(process.env['SANDBOX_GREP_DIAGNOSTICS']),
    logToolErrors: isTrue(process.env['SANDBOX_GREP_TOOL_LOG_ERRORS']),
  };
}

function isTrue(val?: string): boolean {
  const norm = val?.trim().toLowerCase();
  return norm !== undefined && TRUE_ENV_VALUES.has(norm);
}

// --- Event Types ---

export interface ToolDiagnosticsEvent {
  phase: 'start' | 'end';
  tool: string;
  durationMs?: number;
  ok?: boolean;
  error?: string;
}

export interface ScanDiagnosticsEvent extends ScanSummary {
  tool?: string;
  recursive: boolean;
  totalMatches: number;
  durationMs: number;
}

interface ToolAsyncContext {
  tool: string;
}

// --- Channels ---

export const TOOL_CHANNEL_NAME = 'sandbox-grep:tool';
export const SCAN_CHANNEL_NAME = 'sandbox-grep:scan';

const CHANNELS = {
  tool: channel(TOOL_CHANNEL_NAME),
  scan: channel(SCAN_CHANNEL_NAME),
};

const toolContext = new AsyncLocalStorage<ToolAsyncContext>();

// --- Helpers: Result Analysis ---

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function extractOutcome(result: unknown): { ok: boolean; error?: string } {
  if (!isObject(result) || result['isError'] !== true) return { ok: true };

  const structured = result['structuredContent'];
  if (isObject(structured) && typeof structured['error'] === 'string') {
    return { ok: false, error: structured['error'] };
  }
  return { ok: false };
}

function extractErrorMessage(source: unknown): string {
  if (source instanceof Error) return source.message;
  return String(source);
}

function logError(tool: string, durationMs: number, msg?: string): void {
  const suffix = msg ? `: ${msg}` : '';
  console.error(
    `[ToolError] ${tool} failed in ${durationMs.toFixed(1)}ms${suffix}`
  );
}

// --- Public API ---

export function shouldPublishScanSummary(): boolean {
  return readConfig().enabled && CHANNELS.scan.hasSubscribers;
}

export function publishScanSummary(
  event: Omit<ScanDiagnosticsEvent, 'tool'>
): void {
  if (!shouldPublishScanSummary()) return;
  const current = toolContext.getStore();
  const payload: ScanDiagnosticsEvent = current
    ? { ...event, tool: current.tool }
    : event;
  CHANNELS.scan.publish(payload);
}

export async function withToolDiagnostics<T>(
  tool: string,
  run: () => Promise<T>
): Promise<T> {
  const config = readConfig();
  const publishTool = config.enabled && CHANNELS.tool.hasSubscribers;

  return await toolContext.run({ tool }, async () => {
    if (!publishTool && !config.logToolErrors) return await run();

    const start = performance.now();
    if (publishTool) {
      const event: ToolDiagnosticsEvent = { phase: 'start', tool };
      CHANNELS.tool.publish(event);
    }

    let outcome: { ok: boolean; error?: string } = { ok: false };
    try {
      const result = await run();
      outcome = extractOutcome(result);
      return result;
    } catch (error: unknown) {
      outcome = { ok: false, error: extractErrorMessage(error) };
      throw error;
    } finally {
      const durationMs = performance.now() - start;
      if (publishTool) {
        const event: ToolDiagnosticsEvent = {
          phase: 'end',
          tool,
          ok: outcome.ok,
          durationMs,
        };
        if (outcome.error) event.error = outcome.error;
        CHANNELS.tool.publish(event);
      }
      if (config.logToolErrors && !outcome.ok) {
        logError(tool, durationMs, outcome.error);
      }
    }
  });
}
