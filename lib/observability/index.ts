/**
 * Observability Module
 *
 * Centralized exports for LangSmith tracing utilities.
 */

export {
  isTracingEnabled,
  getLangSmithProject,
  createTraceMetadata,
  createTraceTags,
  type TraceMetadata,
  type TraceTags,
} from './langsmith-tracer';

export {
  withLangSmithTrace,
  traceLLMCall,
  traceEmbedding,
  traceRetrieval,
  type TraceableOptions,
} from './langsmith-traceable';
