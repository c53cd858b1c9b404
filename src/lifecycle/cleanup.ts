// Outcome ledger for Uninstall. Every step is attempted and recorded; only
// "failed" steps turn the overall result into a partial failure.

export type StepOutcome = "ok" | "skipped" | "warning" | "failed";

export interface CleanupStep {
  readonly step: string;
  readonly outcome: StepOutcome;
  readonly detail?: string;
}

export class CleanupReport {
  private readonly steps: CleanupStep[] = [];

  ok(step: string, detail?: string): void {
    this.steps.push({ step, outcome: "ok", detail });
  }

  skip(step: string, detail?: string): void {
    this.steps.push({ step, outcome: "skipped", detail });
  }

  warn(step: string, detail: string): void {
    this.steps.push({ step, outcome: "warning", detail });
  }

  fail(step: string, detail: string): void {
    this.steps.push({ step, outcome: "failed", detail });
  }

  get success(): boolean {
    return !this.steps.some((s) => s.outcome === "failed");
  }

  entries(): CleanupStep[] {
    return [...this.steps];
  }

  byOutcome(outcome: StepOutcome): CleanupStep[] {
    return this.steps.filter((s) => s.outcome === outcome);
  }
}
