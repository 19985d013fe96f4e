/**
 * Live status display for long transfers.
 * Allows running the fetch engine without a terminal.
 */
export interface ProgressReporter {
  /** Replace the current status line */
  update(text: string): void;
}
