export type Json =
  | string
  | number
  | boolean
  | null
  | { [key: string]: Json | undefined }
  | Json[];

type GenericTable = {
  Row: Record<string, unknown>;
  Insert: Record<string, unknown>;
  Update: Record<string, unknown>;
  Relationships: {
    foreignKeyName: string;
    columns: string[];
    isOneToOne: boolean;
    referencedRelation: string;
    referencedColumns: string[];
  }[];
};

export type DecisionRow = {
  id: number;
  timestamp: string;
  week: number;
  season: number;
  decision_type: string;
  description: string;
  reasoning: string;
  confidence: number;
  players_involved: string[];
  was_executed: boolean;
  outcome: string | null;
};

export type PerformanceMetricsRow = {
  id: number;
  week: number;
  season: number;
  projected_points: number;
  actual_points: number;
  accuracy: number;
  decision_quality: number;
  notes: string;
  recorded_at: string;
};

export type LineupHistoryRow = {
  id: number;
  team_id: string;
  week: number;
  season: number;
  slots: Json;
  total_projected_points: number;
  risk_level: string;
  created_at: string;
};

type Table<Row extends { id: number }, Defaulted extends keyof Row = never> = {
  Row: Row;
  Insert: Omit<Row, "id" | Defaulted> & Partial<Pick<Row, Defaulted>>;
  Update: Partial<Omit<Row, "id">>;
  Relationships: [];
};

export type Database = {
  public: {
    Tables: {
      [key: string]: GenericTable;
      decisions: Table<DecisionRow>;
      performance_metrics: Table<PerformanceMetricsRow, "recorded_at">;
      lineup_history: Table<LineupHistoryRow, "created_at">;
    };
    Views: Record<string, never>;
    Functions: Record<string, never>;
    Enums: Record<string, never>;
    CompositeTypes: Record<string, never>;
  };
};
