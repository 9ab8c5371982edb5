/**
 * LangSmith Tracer Configuration
 *
 * Centralized LangSmith configuration and trace metadata helpers.
 */

import { config } from "../config";

/**
 * Check if LangSmith tracing is enabled based on configuration
 */
export function isTracingEnabled(): boolean {
  const hasApiKey = !!(config.langsmithApiKey || process.env.LANGSMITH_API_KEY?.trim());
  return hasApiKey && config.langsmithTracingEnabled;
}

/**
 * Get LangSmith project name
 */
export function getLangSmithProject(): string {
  return config.langsmithProject || process.env.LANGSMITH_PROJECT || 'default';
}

export interface TraceMetadata {
  threadId?: string;
  node?: string;
  model?: string;
  [key: string]: string | number | boolean | undefined;
}

/**
 * Create trace metadata with standard fields
 */
export function createTraceMetadata(metadata: TraceMetadata): Record<string, string | number | boolean> {
  const baseMetadata: Record<string, string | number | boolean> = {
    environment: config.environment,
  };

  for (const [key, value] of Object.entries(metadata)) {
    if (value !== undefined) {
      baseMetadata[key] = value;
    }
  }

  return baseMetadata;
}

export interface TraceTags {
  component?: string;
  operation?: string;
  [key: string]: string | undefined;
}

/**
 * Create trace tags for filtering and searching
 */
export function createTraceTags(tags: TraceTags): string[] {
  const baseTags: Record<string, string> = {
    service: 'ticket-triage',
  };

  for (const [key, value] of Object.entries(tags)) {
    if (value !== undefined) {
      baseTags[key] = value;
    }
  }

  return Object.values(baseTags);
}
