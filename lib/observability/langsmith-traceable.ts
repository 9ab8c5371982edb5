/**
 * LangSmith Traceable Wrapper
 *
 * Wraps async functions in LangSmith runs. Nested calls attach to the current
 * run through the SDK's AsyncLocalStorage context.
 */

import { traceable } from "langsmith/traceable";
import {
  createTraceMetadata,
  createTraceTags,
  getLangSmithProject,
  isTracingEnabled,
  type TraceMetadata,
  type TraceTags,
} from "./langsmith-tracer";

export interface TraceableOptions {
  name: string;
  runType?: "llm" | "chain" | "tool" | "retriever" | "embedding" | "prompt";
  metadata?: TraceMetadata;
  tags?: TraceTags;
}

/**
 * Wrap a function to create a LangSmith trace span.
 * Returns the function unchanged when tracing is disabled.
 *
 * @example
 * ```typescript
 * const search = withLangSmithTrace(
 *   (query: string) => index.search(query),
 *   { name: "kb_search", runType: "retriever" }
 * );
 * ```
 */
export function withLangSmithTrace<Args extends unknown[], Return>(
  fn: (...args: Args) => Promise<Return>,
  options: TraceableOptions
): (...args: Args) => Promise<Return> {
  if (!isTracingEnabled()) {
    return fn;
  }

  const { name, runType = "chain", metadata = {}, tags = {} } = options;

  return traceable(fn, {
    name,
    run_type: runType,
    project_name: getLangSmithProject(),
    metadata: createTraceMetadata(metadata),
    tags: createTraceTags(tags),
  }) as (...args: Args) => Promise<Return>;
}

/**
 * Helper to trace LLM calls with standardized metadata
 */
export function traceLLMCall<Args extends unknown[], Return>(
  fn: (...args: Args) => Promise<Return>,
  options: Omit<TraceableOptions, 'runType'> & { model?: string; provider?: string }
): (...args: Args) => Promise<Return> {
  const { model, provider = "anthropic", metadata = {}, tags = {}, ...rest } = options;

  return withLangSmithTrace(fn, {
    ...rest,
    runType: "llm",
    metadata: { ...metadata, model, provider },
    tags: { ...tags, component: "llm", provider },
  });
}

/**
 * Helper to trace embedding generation
 */
export function traceEmbedding<Args extends unknown[], Return>(
  fn: (...args: Args) => Promise<Return>,
  options: Omit<TraceableOptions, 'runType'> & { model?: string }
): (...args: Args) => Promise<Return> {
  const { model, metadata = {}, tags = {}, ...rest } = options;

  return withLangSmithTrace(fn, {
    ...rest,
    runType: "embedding",
    metadata: { ...metadata, model },
    tags: { ...tags, component: "embedding" },
  });
}

/**
 * Helper to trace retrieval operations (knowledge base search)
 */
export function traceRetrieval<Args extends unknown[], Return>(
  fn: (...args: Args) => Promise<Return>,
  options: Omit<TraceableOptions, 'runType'> & { topK?: number; source?: string }
): (...args: Args) => Promise<Return> {
  const { topK, source = "unknown", metadata = {}, tags = {}, ...rest } = options;

  return withLangSmithTrace(fn, {
    ...rest,
    runType: "retriever",
    metadata: { ...metadata, topK, source },
    tags: { ...tags, component: "retriever", source },
  });
}
