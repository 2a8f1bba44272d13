/**
 * DecisionStore: write-only log of what the optimizer decided
 *
 * Every run records its lineup decision, any waiver suggestions and the
 * lineup it produced. Persistence is best-effort: a failed write is logged
 * and reported as `false`, and never interrupts a run.
 *
 * @module services/decision-store
 */

import { getErrorMessage } from "@/lib/errors";
import type { PersistenceConfig } from "@/lib/settings";
import type { Lineup } from "@/types/fantasy";
import type { Database, Json } from "@/types/supabase";
import { createAdminClient, type AdminClient } from "@/utils/supabase/server";

// ─── Records ──────────────────────────────────────────────────────────────────

export type DecisionType = "lineup_optimization" | "waiver_pickup" | "injury_replacement";

export type DecisionOutcome = "success" | "failure" | "pending";

export interface DecisionLog {
  timestamp: string;
  week: number;
  season: number;
  decisionType: DecisionType;
  description: string;
  reasoning: string;
  /** 0..1 */
  confidence: number;
  /** Player names */
  playersInvolved: string[];
  wasExecuted: boolean;
  outcome?: DecisionOutcome;
}

export interface PerformanceMetrics {
  week: number;
  season: number;
  projectedPoints: number;
  actualPoints: number;
  accuracy: number;
  decisionQuality: number;
  notes: string;
}

export interface DecisionStore {
  saveDecision(decision: DecisionLog): Promise<boolean>;
  savePerformanceMetrics(metrics: PerformanceMetrics): Promise<boolean>;
  saveLineupHistory(lineup: Lineup): Promise<boolean>;
}

type TableName = "decisions" | "performance_metrics" | "lineup_history";
type InsertRow<T extends TableName> = Database["public"]["Tables"][T]["Insert"];

// ─── Row mapping ──────────────────────────────────────────────────────────────

export const toDecisionRow = (decision: DecisionLog): InsertRow<"decisions"> => ({
  timestamp: decision.timestamp,
  week: decision.week,
  season: decision.season,
  decision_type: decision.decisionType,
  description: decision.description,
  reasoning: decision.reasoning,
  confidence: decision.confidence,
  players_involved: decision.playersInvolved,
  was_executed: decision.wasExecuted,
  outcome: decision.outcome ?? null,
});

export const toPerformanceMetricsRow = (metrics: PerformanceMetrics): InsertRow<"performance_metrics"> => ({
  week: metrics.week,
  season: metrics.season,
  projected_points: metrics.projectedPoints,
  actual_points: metrics.actualPoints,
  accuracy: metrics.accuracy,
  decision_quality: metrics.decisionQuality,
  notes: metrics.notes,
});

export const toLineupHistoryRow = (lineup: Lineup): InsertRow<"lineup_history"> => {
  const slots: Json = lineup.slots.map((slot) => ({
    slot: slot.kind,
    player_id: slot.player?.id ?? null,
    player_name: slot.player?.name ?? null,
    position: slot.player?.position ?? null,
  }));

  return {
    team_id: lineup.teamId,
    week: lineup.week,
    season: lineup.season,
    slots,
    total_projected_points: lineup.totalProjectedPoints,
    risk_level: lineup.riskLevel,
    created_at: lineup.lastUpdated,
  };
};

// ─── Implementations ──────────────────────────────────────────────────────────

export class SupabaseDecisionStore implements DecisionStore {
  private client: AdminClient;

  constructor(url: string, serviceRoleKey: string) {
    this.client = createAdminClient(url, serviceRoleKey);
  }

  private async write(
    table: TableName,
    run: () => PromiseLike<{ error: { message: string } | null }>
  ): Promise<boolean> {
    try {
      const { error } = await run();
      if (error) {
        console.error(`[DecisionStore] Failed to write ${table}: ${error.message}`);
        return false;
      }
      return true;
    } catch (error) {
      console.error(`[DecisionStore] Failed to write ${table}: ${getErrorMessage(error)}`);
      return false;
    }
  }

  saveDecision(decision: DecisionLog): Promise<boolean> {
    return this.write("decisions", () => this.client.from("decisions").insert(toDecisionRow(decision)));
  }

  savePerformanceMetrics(metrics: PerformanceMetrics): Promise<boolean> {
    return this.write("performance_metrics", () =>
      this.client.from("performance_metrics").insert(toPerformanceMetricsRow(metrics))
    );
  }

  saveLineupHistory(lineup: Lineup): Promise<boolean> {
    return this.write("lineup_history", () =>
      this.client.from("lineup_history").insert(toLineupHistoryRow(lineup))
    );
  }
}

/** Used when persistence is not configured. Accepts everything, stores nothing. */
export class NoopDecisionStore implements DecisionStore {
  async saveDecision(): Promise<boolean> {
    return true;
  }

  async savePerformanceMetrics(): Promise<boolean> {
    return true;
  }

  async saveLineupHistory(): Promise<boolean> {
    return true;
  }
}

export function createDecisionStore(config: PersistenceConfig): DecisionStore {
  if (config.supabaseUrl && config.supabaseKey) {
    return new SupabaseDecisionStore(config.supabaseUrl, config.supabaseKey);
  }
  console.log("[DecisionStore] Supabase not configured; decision log disabled");
  return new NoopDecisionStore();
}
