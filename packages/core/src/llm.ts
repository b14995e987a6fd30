import type { LlmModelStats, LlmStats } from "@steptrace/contracts";

const UNKNOWN_MODEL = "unknown";

function emptyModelStats(model: string): LlmModelStats {
  return { model, requests: 0, responses: 0, tokens: 0, costUsd: 0 };
}

/** Token and cost totals reported by the agent's model client, per model. */
export class LlmUsageTracker {
  private readonly models = new Map<string, LlmModelStats>();

  private entry(model: string): LlmModelStats {
    const key = model.trim() || UNKNOWN_MODEL;
    let stats = this.models.get(key);
    if (!stats) {
      stats = emptyModelStats(key);
      this.models.set(key, stats);
    }
    return stats;
  }

  recordUsage(phase: "request" | "response", model: string, tokens: number): void {
    const stats = this.entry(model);
    if (phase === "request") {
      stats.requests += 1;
    } else {
      stats.responses += 1;
    }
    stats.tokens += tokens;
  }

  recordCost(costUsd: number, model: string): void {
    this.entry(model).costUsd += costUsd;
  }

  stats(): LlmStats {
    const models = [...this.models.values()]
      .map((stats) => ({ ...stats, costUsd: Math.round(stats.costUsd * 1_000_000) / 1_000_000 }))
      .sort((left, right) => right.tokens - left.tokens || left.model.localeCompare(right.model));
    let requests = 0;
    let responses = 0;
    let totalTokens = 0;
    let cost = 0;
    for (const stats of this.models.values()) {
      requests += stats.requests;
      responses += stats.responses;
      totalTokens += stats.tokens;
      cost += stats.costUsd;
    }
    return {
      requests,
      responses,
      totalTokens,
      estimatedCostUsd: Math.round(cost * 1_000_000) / 1_000_000,
      models,
    };
  }
}
