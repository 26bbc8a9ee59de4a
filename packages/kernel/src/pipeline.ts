import { v4 as uuid } from "uuid";
import type {
  JournalEventType,
  OutcomeRecord,
  PluginRunRecord,
  PublishReport,
  Settings,
  StageName,
  StageRecord,
} from "@pubkit/schemas";
import { DEFAULT_SETTINGS, PipelineAbortedError, toError } from "@pubkit/schemas";
import type { Journal } from "@pubkit/journal";
import { pluginsByHost, type Context, type DiscoverOptions, type PluginClass, type ProcessResult } from "@pubkit/plugins";

/** Where the pipeline gets its plugins from. `PluginDiscovery` satisfies this. */
export interface PluginSource {
  discover(options?: DiscoverOptions): Promise<PluginClass[]>;
}

export type PipelineSettings = Pick<Settings, "host" | "stages" | "failure_policy" | "stop_on_validation_failure">;

export interface PipelineConfig {
  discovery: PluginSource;
  journal?: Journal;
  settings?: Partial<PipelineSettings>;
}

export interface RunOptions {
  /** Overrides the configured host for this run. */
  host?: string;
  runId?: string;
}

/** Stage whose plugins see the whole context and may add to it. */
const SELECTION_STAGE: StageName = "selectors";
/** Stage whose failures stop later stages when `stop_on_validation_failure` is set. */
const VALIDATION_STAGE: StageName = "validators";

interface PluginRun {
  record: PluginRunRecord;
  /** First failure seen, when the plugin was stopped under the abort policy. */
  abortedBy: Error | null;
}

function toOutcome(result: ProcessResult): OutcomeRecord {
  const outcome: OutcomeRecord = {
    instance_id: result.instance?.id ?? null,
    instance_name: result.instance?.name ?? null,
    ok: result.ok,
  };
  if (!result.ok) outcome.error = { name: result.error.name, message: result.error.message };
  return outcome;
}

/** Plugins ordered by their declared `order`; ties keep discovery order. */
function byOrder(plugins: PluginClass[]): PluginClass[] {
  return [...plugins].sort((a, b) => (a.order ?? 0) - (b.order ?? 0));
}

/**
 * Drives a context through the configured stages. Each plugin is
 * constructed fresh and exhausted before the next one starts.
 */
export class Pipeline {
  private discovery: PluginSource;
  private journal: Journal | undefined;
  private settings: PipelineSettings;

  constructor(config: PipelineConfig) {
    this.discovery = config.discovery;
    this.journal = config.journal;
    this.settings = {
      host: config.settings?.host ?? DEFAULT_SETTINGS.host,
      stages: [...(config.settings?.stages ?? DEFAULT_SETTINGS.stages)],
      failure_policy: config.settings?.failure_policy ?? DEFAULT_SETTINGS.failure_policy,
      stop_on_validation_failure:
        config.settings?.stop_on_validation_failure ?? DEFAULT_SETTINGS.stop_on_validation_failure,
    };
  }

  getSettings(): PipelineSettings {
    return { ...this.settings, stages: [...this.settings.stages] };
  }

  /**
   * Runs every stage against `context`. Under the "abort" policy the first
   * failure is thrown as a `PipelineAbortedError`; otherwise failures are
   * counted in the returned report.
   */
  async run(context: Context, options?: RunOptions): Promise<PublishReport> {
    const runId = options?.runId ?? uuid();
    const host = options?.host ?? this.settings.host;
    const startedAt = new Date().toISOString();
    const stages: StageRecord[] = [];
    let failures = 0;
    let halted = false;

    await this.record(runId, "publish.started", {
      host,
      stages: [...this.settings.stages],
      failure_policy: this.settings.failure_policy,
    });

    for (const stage of this.settings.stages) {
      if (halted) {
        stages.push({ stage, status: "skipped", plugins: [] });
        await this.record(runId, "stage.skipped", { stage, reason: "validation_failed" });
        continue;
      }

      await this.record(runId, "stage.started", { stage });
      const plugins = byOrder(pluginsByHost(await this.discovery.discover({ type: stage, runId }), host));
      const records: PluginRunRecord[] = [];
      let stageFailures = 0;

      for (const plugin of plugins) {
        const target = stage === SELECTION_STAGE ? context : context.subset((i) => i.isIdentified());
        const { record, abortedBy } = await this.runPlugin(runId, stage, plugin, target);
        records.push(record);
        stageFailures += record.outcomes.filter((o) => !o.ok).length;

        if (abortedBy) {
          await this.record(runId, "publish.aborted", {
            stage,
            plugin: plugin.name,
            error: abortedBy.message,
          });
          throw new PipelineAbortedError(`Publish aborted in ${stage} by ${plugin.name}: ${abortedBy.message}`, abortedBy);
        }
      }

      failures += stageFailures;
      stages.push({ stage, status: stageFailures > 0 ? "failed" : "completed", plugins: records });
      await this.record(runId, "stage.completed", { stage, plugins: records.length, failures: stageFailures });

      if (stage === VALIDATION_STAGE && stageFailures > 0 && this.settings.stop_on_validation_failure) {
        halted = true;
      }
    }

    const report: PublishReport = {
      run_id: runId,
      host,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
      stages,
      failures,
    };
    await this.record(runId, "publish.completed", {
      failures,
      stages: stages.map((s) => ({ stage: s.stage, status: s.status })),
    });
    return report;
  }

  private async runPlugin(runId: string, stage: StageName, plugin: PluginClass, target: Context): Promise<PluginRun> {
    const record: PluginRunRecord = { plugin: plugin.name, stage, outcomes: [], crashed: false };
    const abortOnFailure = this.settings.failure_policy === "abort";

    try {
      for (const result of new plugin().process(target)) {
        const outcome = toOutcome(result);
        record.outcomes.push(outcome);
        if (result.ok) {
          await this.record(runId, "instance.processed", {
            stage,
            plugin: plugin.name,
            instance_id: outcome.instance_id,
            instance_name: outcome.instance_name,
          });
          continue;
        }
        await this.record(runId, "instance.failed", {
          stage,
          plugin: plugin.name,
          instance_id: outcome.instance_id,
          instance_name: outcome.instance_name,
          error: outcome.error,
        });
        if (abortOnFailure) return { record, abortedBy: result.error };
      }
    } catch (err) {
      const error = toError(err);
      console.error(`[pipeline] Plugin ${plugin.name} crashed in ${stage}: ${error.message}`);
      record.crashed = true;
      record.outcomes.push({
        instance_id: null,
        instance_name: null,
        ok: false,
        error: { name: error.name, message: error.message },
      });
      await this.record(runId, "plugin.crashed", { stage, plugin: plugin.name, error: error.message });
      if (abortOnFailure) return { record, abortedBy: error };
    }

    return { record, abortedBy: null };
  }

  private async record(runId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.journal?.tryEmit(runId, type, payload);
  }
}
