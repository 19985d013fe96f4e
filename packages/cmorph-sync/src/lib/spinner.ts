/**
 * Spinner wrapper that respects quiet/JSON mode.
 * Doubles as the progress display for file transfers.
 */

import ora, { type Ora } from "ora";
import type { ProgressReporter } from "./ports/progress.js";

export interface Spinner extends ProgressReporter {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements Spinner {
  update(_text: string): void {}

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }

  warn(_text?: string): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    // Progress and status go to stderr; stdout carries the summary.
    this.ora = ora({ text, stream: process.stderr });
  }

  update(text: string): void {
    this.ora.text = text;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }

  warn(text?: string): Spinner {
    this.ora.warn(text);
    return this;
  }
}

export function createSpinner(quiet: boolean, text?: string): Spinner {
  if (quiet) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
