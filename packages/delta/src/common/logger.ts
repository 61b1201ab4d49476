/**
 * Optional logger accepted by components that have something to report.
 *
 * Nothing is logged unless a logger is passed in.
 */
export interface DeltaLogger {
  debug?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
}
