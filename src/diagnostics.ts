// Collects per-joint and per-group restoration decisions so callers can
// inspect them without scraping console output.

import type { Diagnostic, DiagnosticCode, GroupName } from "./types.js";

export interface DiagnosticContext {
  person?: number;
  group?: GroupName;
}

export class DiagnosticsCollector {
  private readonly sink: Diagnostic[];
  private readonly context: DiagnosticContext;

  constructor(sink: Diagnostic[] = [], context: DiagnosticContext = {}) {
    this.sink = sink;
    this.context = context;
  }

  /** A collector writing to the same list, tagging entries with extra context. */
  scoped(context: DiagnosticContext): DiagnosticsCollector {
    return new DiagnosticsCollector(this.sink, { ...this.context, ...context });
  }

  info(code: DiagnosticCode, message: string, index?: number): void {
    this.push({ level: "info", code, message }, index);
  }

  warn(code: DiagnosticCode, message: string, index?: number): void {
    this.push({ level: "warn", code, message }, index);
  }

  get entries(): Diagnostic[] {
    return this.sink;
  }

  count(code: DiagnosticCode): number {
    return this.sink.filter((d) => d.code === code).length;
  }

  private push(entry: Diagnostic, index: number | undefined): void {
    const full: Diagnostic = { ...entry };
    if (this.context.person !== undefined) full.person = this.context.person;
    if (this.context.group !== undefined) full.group = this.context.group;
    if (index !== undefined) full.index = index;
    this.sink.push(full);
  }
}
