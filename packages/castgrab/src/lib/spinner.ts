import ora, { type Ora } from "ora";
import chalk from "chalk";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import { formatProgressLine } from "./format.js";
import type { ProgressSnapshot } from "./download/types.js";

/**
 * Status line for a feed fetch or an episode download.
 * Every call is a no-op in quiet and JSON mode.
 */
export interface Spinner {
  /** Start spinning; `label` heads every later redraw */
  start(label: string): Spinner;
  /** Redraw as `label  percent · rate · ETA` */
  progress(snapshot: ProgressSnapshot): Spinner;
  /** Redraw with a short note after the label, such as "canceling…" */
  status(note: string): Spinner;
  stop(): Spinner;
  succeed(text: string): Spinner;
  warn(text: string): Spinner;
  fail(text: string): Spinner;
}

class StatusSpinner implements Spinner {
  private label = "";
  private readonly ora: Ora | undefined;

  constructor(ora: Ora | undefined) {
    this.ora = ora;
  }

  start(label: string): Spinner {
    this.label = label;
    this.ora?.start(label);
    return this;
  }

  progress(snapshot: ProgressSnapshot): Spinner {
    return this.redraw(chalk.gray(formatProgressLine(snapshot)));
  }

  status(note: string): Spinner {
    return this.redraw(chalk.yellow(note));
  }

  stop(): Spinner {
    this.ora?.stop();
    return this;
  }

  succeed(text: string): Spinner {
    this.ora?.succeed(text);
    return this;
  }

  warn(text: string): Spinner {
    this.ora?.warn(text);
    return this;
  }

  fail(text: string): Spinner {
    this.ora?.fail(text);
    return this;
  }

  private redraw(suffix: string): Spinner {
    if (this.ora) {
      this.ora.text = `${this.label} ${suffix}`;
    }
    return this;
  }
}

export function createSpinner(): Spinner {
  return new StatusSpinner(isQuietMode() || isJsonMode() ? undefined : ora());
}
