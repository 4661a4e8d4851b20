/**
 * Core module exports for @seqparse/core
 *
 * This package provides the ambient pieces the parser packages share:
 * - Configuration (config files, SEQPARSE_* environment variables, overrides)
 * - Trace logging for labelled parsers
 * - Runtime safety primitives (invariant, unreachable)
 */

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";

// Configuration System
export {
  config,
  defineConfig,
  ConfigError,
  type SeqparseConfig,
  type TraceConfig,
  type TraceSettings,
} from "./config.js";

// Trace logging
export {
  createTracer,
  getTracer,
  setTraceWriter,
  shouldTrace,
  type Tracer,
  type TracerOptions,
  type TraceWriter,
} from "./trace.js";
