import { resolve } from "node:path";
import { Command, Option } from "commander";
import type { FailurePolicy, PublishReport, Settings, StageName } from "@pubkit/schemas";
import { errorMessage, loadSettings, PipelineAbortedError } from "@pubkit/schemas";
import { Journal } from "@pubkit/journal";
import { Context, PluginDiscovery, PluginRegistry, type DiscoveredPlugin } from "@pubkit/plugins";
import { Pipeline } from "@pubkit/kernel";

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface ProgramOptions {
  output?: CliOutput;
  env?: NodeJS.ProcessEnv;
  /** Plugin module extensions passed to discovery. */
  extensions?: readonly string[];
  /** Receives the process exit code for failed publishes. */
  setExitCode?: (code: number) => void;
}

interface SettingsFlags {
  config?: string;
  path?: string[];
}

interface DiscoverFlags extends SettingsFlags {
  type?: StageName;
  regex?: string;
}

interface PublishFlags extends SettingsFlags {
  host?: string;
  policy?: FailurePolicy;
  journal?: string;
}

interface RunsFlags {
  config?: string;
  journal?: string;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

async function resolveSettings(flags: SettingsFlags, env: NodeJS.ProcessEnv): Promise<Settings> {
  const settings = await loadSettings(flags.config, env);
  const extra = (flags.path ?? []).map((p) => resolve(p)).filter((p) => !settings.plugin_paths.includes(p));
  return { ...settings, plugin_paths: [...settings.plugin_paths, ...extra] };
}

function listOrWildcard(values: readonly string[]): string {
  return values.length > 0 ? values.join(",") : "*";
}

/** `<stage>\t<name>\t<hosts>\t<families>\t<file>`; an unrestricted list prints as `*`. */
export function formatPluginLine(entry: DiscoveredPlugin): string {
  const { metadata } = entry;
  return [metadata.stage, metadata.name, listOrWildcard(metadata.hosts), listOrWildcard(metadata.families), entry.file].join("\t");
}

export function formatReport(report: PublishReport): string[] {
  const lines = [`Publish ${report.run_id} (host: ${report.host})`];
  for (const stage of report.stages) {
    lines.push(`  ${stage.stage}: ${stage.status}`);
    for (const run of stage.plugins) {
      for (const outcome of run.outcomes) {
        if (outcome.ok) continue;
        const target = outcome.instance_name ?? "<plugin>";
        lines.push(`    ${run.plugin} on ${target}: ${outcome.error?.message ?? "unknown error"}`);
      }
    }
  }
  lines.push(report.failures === 0 ? "Publish completed" : `Publish finished with ${report.failures} failure(s)`);
  return lines;
}

export function buildProgram(options?: ProgramOptions): Command {
  const output = options?.output ?? consoleOutput;
  const env = options?.env ?? process.env;
  const setExitCode = options?.setExitCode ?? ((code: number) => { process.exitCode = code; });

  async function createDiscovery(settings: Settings, journal?: Journal): Promise<PluginDiscovery> {
    const registry = new PluginRegistry();
    await registry.registerFromSettings(settings);
    return new PluginDiscovery(registry, { extensions: options?.extensions, journal });
  }

  const program = new Command();
  program.name("pubkit").description("pubkit: staged asset publishing").version("0.1.0");
  program.configureOutput({
    writeOut: (str) => output.log(str.trimEnd()),
    writeErr: (str) => output.error(str.trimEnd()),
  });

  program.command("discover").description("List the plugins found on the plugin paths")
    .option("-t, --type <stage>", "Only plugins of this stage")
    .option("-r, --regex <pattern>", "Only plugins whose class name matches, from its first character")
    .option("-p, --path <dir...>", "Additional plugin directories")
    .option("-c, --config <file>", "Settings file (default: ./pubkit.yaml)")
    .action(async (opts: DiscoverFlags) => {
      const settings = await resolveSettings(opts, env);
      const discovery = await createDiscovery(settings);
      const entries = await discovery.discoverEntries({ type: opts.type, regex: opts.regex });
      if (entries.length === 0) { output.log("No plugins found."); return; }
      for (const entry of entries) output.log(formatPluginLine(entry));
    });

  program.command("publish").description("Run every stage against a fresh context")
    .option("--host <name>", "Host to publish from")
    .option("-p, --path <dir...>", "Additional plugin directories")
    .option("-c, --config <file>", "Settings file (default: ./pubkit.yaml)")
    .addOption(new Option("--policy <policy>", "What to do after a failure").choices(["continue", "abort"]))
    .option("-j, --journal <file>", "Record the run in this journal")
    .action(async (opts: PublishFlags) => {
      const settings = await resolveSettings(opts, env);
      const journalPath = opts.journal ?? settings.journal_path;
      const journal = journalPath ? new Journal(resolve(journalPath)) : undefined;
      await journal?.init();

      try {
        const pipeline = new Pipeline({
          discovery: await createDiscovery(settings, journal),
          journal,
          settings: {
            host: opts.host ?? settings.host,
            stages: settings.stages,
            failure_policy: opts.policy ?? settings.failure_policy,
            stop_on_validation_failure: settings.stop_on_validation_failure,
          },
        });
        const report = await pipeline.run(new Context({ identifierKey: settings.identifier_key }));
        for (const line of formatReport(report)) output.log(line);
        if (report.failures > 0) setExitCode(1);
      } catch (err) {
        if (!(err instanceof PipelineAbortedError)) throw err;
        output.error(`[pubkit] ${err.message}`);
        setExitCode(1);
      } finally {
        await journal?.close();
      }
    });

  program.command("paths").description("Print the effective plugin paths")
    .option("-p, --path <dir...>", "Additional plugin directories")
    .option("-c, --config <file>", "Settings file (default: ./pubkit.yaml)")
    .action(async (opts: SettingsFlags) => {
      const settings = await resolveSettings(opts, env);
      if (settings.plugin_paths.length === 0) { output.log("No plugin paths registered."); return; }
      for (const path of settings.plugin_paths) output.log(path);
    });

  program.command("runs").description("List the publish runs recorded in a journal")
    .option("-j, --journal <file>", "Journal file (default: settings journal_path)")
    .option("-c, --config <file>", "Settings file (default: ./pubkit.yaml)")
    .action(async (opts: RunsFlags) => {
      const settings = await loadSettings(opts.config, env);
      const journalPath = opts.journal ?? settings.journal_path;
      if (!journalPath) {
        output.error("[pubkit] No journal configured. Pass --journal or set PUBKIT_JOURNAL_PATH.");
        setExitCode(1);
        return;
      }
      const journal = new Journal(resolve(journalPath), { lock: false, recovery: "strict" });
      try {
        await journal.init();
      } catch (err) {
        output.error(`[pubkit] ${errorMessage(err)}`);
        setExitCode(1);
        return;
      }
      const runs = journal.listRuns();
      if (runs.length === 0) output.log("No runs recorded.");
      for (const runId of runs) {
        const events = journal.readRun(runId);
        const last = events[events.length - 1];
        output.log(`${runId}\t${events.length}\t${last?.type ?? ""}`);
      }
      await journal.close();
    });

  return program;
}
