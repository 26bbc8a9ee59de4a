/**
 * pubkit Core Types
 *
 * Shared records for the publishing runtime. Classes that carry behaviour
 * (Instance, Context, plugin bases) live in @pubkit/plugins; everything here
 * is plain data.
 */

// ─── Stages ─────────────────────────────────────────────────────────

export const DEFAULT_STAGES = ["selectors", "validators", "extractors", "conformers"] as const;

export type BuiltinStage = (typeof DEFAULT_STAGES)[number];

/** Stage tags are open-ended: a plugin may declare any tag and discovery will classify it. */
export type StageName = BuiltinStage | (string & {});

// ─── Plugin metadata ────────────────────────────────────────────────

/** The static description a plugin class declares about itself. */
export interface PluginMetadata {
  name: string;
  stage: StageName;
  hosts: string[];
  families: string[];
  order: number;
  label?: string;
  version?: string;
}

export interface DiscoveryDiagnostic {
  file: string;
  export_name?: string;
  error: string;
}

// ─── Settings ───────────────────────────────────────────────────────

export type FailurePolicy = "continue" | "abort";

export interface Settings {
  /** Config key whose truthy value marks an instance as publishable. */
  identifier_key: string;
  plugin_paths: string[];
  host: string;
  stages: StageName[];
  failure_policy: FailurePolicy;
  stop_on_validation_failure: boolean;
  journal_path?: string;
}

// ─── Publish report ─────────────────────────────────────────────────

export type StageStatus = "completed" | "failed" | "skipped";

export interface OutcomeRecord {
  instance_id: string | null;
  instance_name: string | null;
  ok: boolean;
  error?: { name: string; message: string };
}

export interface PluginRunRecord {
  plugin: string;
  stage: StageName;
  outcomes: OutcomeRecord[];
  crashed: boolean;
}

export interface StageRecord {
  stage: StageName;
  status: StageStatus;
  plugins: PluginRunRecord[];
}

export interface PublishReport {
  run_id: string;
  host: string;
  started_at: string;
  finished_at: string;
  stages: StageRecord[];
  failures: number;
}

// ─── Journal Events ─────────────────────────────────────────────────

export type JournalEventType =
  | "publish.started"
  | "publish.completed"
  | "publish.aborted"
  | "stage.started"
  | "stage.completed"
  | "stage.skipped"
  | "plugin.discovered"
  | "plugin.failed"
  | "plugin.crashed"
  | "instance.processed"
  | "instance.failed";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  run_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Logging ────────────────────────────────────────────────────────

export interface PluginLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
