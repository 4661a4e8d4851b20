/**
 * Trace logging for labelled parsers.
 *
 * Output is off unless `trace.enabled` is set (see {@link config}). Lines go
 * to a pluggable writer, `console.error` by default, indented by nesting depth:
 *
 * ```
 * > item @11
 *   > name @12
 *   < name ok "var1" @16
 * < item ok "var1" @19
 * ```
 */

import { config, ConfigError, type TraceSettings } from "./config.js";

/** Receives one rendered trace line at a time. */
export type TraceWriter = (line: string) => void;

export interface TracerOptions {
  /** Custom writer function (default: console.error) */
  writer?: TraceWriter;
  /** Spaces per nesting level (default: 2) */
  indent?: number;
}

export interface Tracer {
  enter(label: string, offset?: number): void;
  exit(label: string, outcome: string, offset?: number): void;
}

function at(offset: number | undefined): string {
  return offset === undefined ? "" : ` @${offset}`;
}

/**
 * Create a tracer with its own nesting depth.
 */
export function createTracer(options: TracerOptions = {}): Tracer {
  const writer = options.writer ?? ((line: string) => console.error(line));
  const unit = " ".repeat(options.indent ?? 2);
  let depth = 0;

  return {
    enter(label, offset) {
      writer(`${unit.repeat(depth)}> ${label}${at(offset)}`);
      depth++;
    },
    exit(label, outcome, offset) {
      depth = Math.max(0, depth - 1);
      writer(`${unit.repeat(depth)}< ${label} ${outcome}${at(offset)}`);
    },
  };
}

let activeWriter: TraceWriter | undefined;
let activeTracer: Tracer = createTracer();
let reportedFailure: string | undefined;

/** The tracer labelled parsers report to. */
export function getTracer(): Tracer {
  return activeTracer;
}

/**
 * Redirect trace output. Calling with no writer restores `console.error`.
 * Nesting depth starts over either way.
 */
export function setTraceWriter(writer?: TraceWriter): void {
  activeWriter = writer;
  activeTracer = createTracer({ writer });
  reportedFailure = undefined;
}

const TRACING_OFF: TraceSettings = { enabled: false, labels: [] };

/**
 * Trace settings for the parse path. A config file that fails to load turns
 * tracing off and is reported once through the trace writer.
 */
function readTraceSettings(): TraceSettings {
  try {
    return config.traceSettings();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    if (reportedFailure !== error.message) {
      reportedFailure = error.message;
      const writer = activeWriter ?? ((line: string) => console.error(line));
      writer(`! tracing disabled: ${error.message}`);
    }
    return TRACING_OFF;
  }
}

/**
 * Whether invocations of the parser labelled `label` should be traced.
 * Never throws: parsing goes on untraced when the configuration is broken.
 */
export function shouldTrace(label: string): boolean {
  const { enabled, labels } = readTraceSettings();
  if (!enabled) return false;
  return labels.length === 0 || labels.includes(label);
}
