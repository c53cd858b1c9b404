// Safety gate: every state-changing tool asks it before touching the host.
// Risk starts at the tool's level, per-call escalations may raise it, and
// anything at or above the configured threshold needs `confirmed: true`.
import type { RiskLevel } from "../types/risk.js";
import { RISK_ORDER } from "../types/risk.js";
import type { ConfirmationResponse } from "../types/response.js";
import { logger } from "../logger.js";

/** Raises the risk of one invocation, e.g. when it may reboot the host. */
export interface Escalation {
  readonly riskLevel: RiskLevel;
  readonly reason: string;
}

export class SafetyGate {
  private readonly threshold: RiskLevel;

  constructor(config: { confirmation_threshold: RiskLevel }) {
    this.threshold = config.confirmation_threshold;
  }

  /** Returns null when the call may proceed, otherwise the confirmation request. */
  check(params: {
    toolName: string;
    toolRiskLevel: RiskLevel;
    targetHost: string;
    description: string;
    confirmed?: boolean;
    escalations?: readonly Escalation[];
  }): ConfirmationResponse | null {
    if (RISK_ORDER[params.toolRiskLevel] < RISK_ORDER["moderate"]) return null;

    let effectiveRisk = params.toolRiskLevel;
    const reasons: string[] = [];
    for (const esc of params.escalations ?? []) {
      reasons.push(esc.reason);
      if (RISK_ORDER[esc.riskLevel] > RISK_ORDER[effectiveRisk]) effectiveRisk = esc.riskLevel;
    }

    if (RISK_ORDER[effectiveRisk] < RISK_ORDER[this.threshold]) return null;
    if (params.confirmed) return null;

    logger.info({ tool: params.toolName, effectiveRisk, threshold: this.threshold }, "Confirmation required");
    return {
      status: "confirmation_required",
      tool: params.toolName,
      target_host: params.targetHost,
      duration_ms: null,
      risk_level: effectiveRisk,
      preview: {
        description: params.description,
        warnings: reasons,
        escalation_reason: effectiveRisk !== params.toolRiskLevel
          ? `Escalated from ${params.toolRiskLevel} to ${effectiveRisk}: ${reasons.join("; ")}`
          : undefined,
      },
    };
  }
}
