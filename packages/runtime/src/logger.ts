// Decision tracing
//
// Evaluation never fails loudly, so tracing is how a host finds out why a
// node was hidden: every decision, every denied set and every rule operand
// that did not resolve is reported at debug level.

/**
 * Logger for privilege evaluation.
 * Hosts usually adapt their own logger's debug method.
 */
export type AuthorizationLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
};

/**
 * Console logger, prefixed so traces stand out in host output
 */
export const consoleLogger: AuthorizationLogger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[treegate] ${message}`, data ?? '');
  },
};

/**
 * Logger that drops everything; the default when none is configured
 */
export const silentLogger: AuthorizationLogger = {
  debug() {},
};

export type LogEntry = {
  message: string;
  data?: Record<string, unknown>;
};

export type CapturingLogger = AuthorizationLogger & {
  entries: LogEntry[];

  /**
   * Entries traced while evaluating one node
   */
  entriesFor(nodeAggregateId: string): LogEntry[];
};

/**
 * Create a logger that keeps its entries for inspection
 */
export function createCapturingLogger(): CapturingLogger {
  const entries: LogEntry[] = [];

  return {
    entries,
    debug(message, data) {
      entries.push(data === undefined ? { message } : { message, data });
    },
    entriesFor(nodeAggregateId) {
      return entries.filter((entry) => entry.data?.nodeAggregateId === nodeAggregateId);
    },
  };
}
