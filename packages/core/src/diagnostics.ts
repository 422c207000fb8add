// Optional collector for content problems that spawning skips over

import { Errors } from "./errors";

export type DiagnosticKind =
  | "unknown-component"
  | "unknown-field"
  | "type-mismatch"
  | "unresolved-prefab"
  | "position-too-small";

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  component?: string;
  field?: string;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

export interface DiagnosticsOptions {
  /** Throw on the first report instead of collecting it */
  strict?: boolean;
  listener?: DiagnosticListener;
}

export class Diagnostics {
  readonly strict: boolean;
  private entries: Diagnostic[] = [];
  private listener?: DiagnosticListener;

  constructor(options: DiagnosticsOptions = {}) {
    this.strict = options.strict ?? false;
    this.listener = options.listener;
  }

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    this.listener?.(diagnostic);
    if (this.strict) {
      throw Errors.strictViolation(diagnostic.message);
    }
  }

  get items(): readonly Diagnostic[] {
    return this.entries;
  }

  get count(): number {
    return this.entries.length;
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.entries.filter((d) => d.kind === kind);
  }

  clear(): void {
    this.entries = [];
  }
}

export function consoleReporter(diagnostic: Diagnostic): void {
  console.warn(`[keystone] ${diagnostic.kind}: ${diagnostic.message}`);
}
