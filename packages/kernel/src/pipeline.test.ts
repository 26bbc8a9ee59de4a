import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import { v4 as uuid } from "uuid";
import { PipelineAbortedError, ValidationError } from "@pubkit/schemas";
import { Journal } from "@pubkit/journal";
import {
  Context,
  Instance,
  Selector,
  Validator,
  Extractor,
  Conformer,
  PluginRegistry,
  PluginDiscovery,
  type InstanceView,
  type PluginClass,
  type ProcessResult,
} from "@pubkit/plugins";
import { Pipeline, type PluginSource } from "./pipeline.js";

const FIXTURE_PLUGINS = fileURLToPath(new URL("./__fixtures__/publish", import.meta.url));

function prop(name: string, nodes: string[], publishable = true): Instance {
  const instance = new Instance(name);
  for (const node of nodes) instance.add(node);
  instance.config.family = "prop";
  instance.config.host = "node";
  instance.config.identifier = publishable;
  return instance;
}

class SelectProps extends Selector {
  *select(): Generator<Instance> {
    yield prop("Crate", ["crate_PLY", "lid_PLY"]);
    yield prop("Scratch", ["scratch_PLY"], false);
  }
}

class SelectMisnamed extends Selector {
  *select(): Generator<Instance> {
    yield prop("Barrel", ["barrel_PLY", "hoop"]);
  }
}

class SelectMayaScene extends Selector {
  static hosts = ["maya"];

  *select(): Generator<Instance> {
    yield prop("MayaScene", []);
  }
}

class ValidateNaming extends Validator {
  static families = ["prop"];

  validate(instance: InstanceView): void {
    const misnamed = instance.nodes.filter((node) => !node.endsWith("_PLY"));
    if (misnamed.length > 0) {
      throw new ValidationError(`Misnamed nodes in "${instance.name}": ${misnamed.join(", ")}`);
    }
  }
}

class ValidateEarly extends Validator {
  static order = 1;

  validate(): void {}
}

class ValidateLate extends Validator {
  static order = 2;

  validate(): void {}
}

class ExtractProps extends Extractor {
  static families = ["prop"];
  static extracted: string[] = [];

  extract(instance: Instance): void {
    ExtractProps.extracted.push(instance.name);
  }
}

class ExtractBroken extends Extractor {
  extract(instance: Instance): void {
    throw new Error(`disk full while writing ${instance.name}`);
  }
}

class ConformProps extends Conformer {
  static families = ["prop"];
  static conformed: string[] = [];

  conform(instance: InstanceView): void {
    ConformProps.conformed.push(instance.name);
  }
}

class ExplodingConformer {
  static stage = "conformers";
  static hosts: string[] = [];
  static families: string[] = [];

  constructor() {
    throw new Error("missing tracker credentials");
  }

  process(): Iterable<ProcessResult> {
    return [];
  }
}

class TrackerOffline {
  static stage = "conformers";
  static hosts: string[] = [];
  static families: string[] = [];

  *process(): Generator<ProcessResult> {
    throw "tracker offline";
  }
}

class NotifyChat {
  static stage = "notifiers";
  static hosts: string[] = [];
  static families: string[] = [];

  *process(context: Context): Generator<ProcessResult> {
    for (const instance of context) yield { ok: true, instance };
  }
}

function staticSource(plugins: PluginClass[]): PluginSource {
  return {
    async discover(options) {
      return plugins.filter((p) => options?.type === undefined || p.stage === options.type);
    },
  };
}

describe("Pipeline", () => {
  beforeEach(() => {
    ExtractProps.extracted = [];
    ConformProps.conformed = [];
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs every stage in order and reports each outcome", async () => {
    const pipeline = new Pipeline({ discovery: staticSource([ConformProps, ExtractProps, ValidateNaming, SelectProps]) });
    const context = new Context();

    const report = await pipeline.run(context, { runId: "run-1" });

    expect(report.run_id).toBe("run-1");
    expect(report.host).toBe("node");
    expect(report.failures).toBe(0);
    expect(report.stages.map((s) => [s.stage, s.status])).toEqual([
      ["selectors", "completed"],
      ["validators", "completed"],
      ["extractors", "completed"],
      ["conformers", "completed"],
    ]);
    expect(report.stages[0]!.plugins[0]!.outcomes.map((o) => o.instance_name)).toEqual(["Crate", "Scratch"]);
    expect([...context].map((i) => i.name)).toEqual(["Crate", "Scratch"]);
    expect(ExtractProps.extracted).toEqual(["Crate"]);
    expect(ConformProps.conformed).toEqual(["Crate"]);
  });

  it("hands only identified instances to later stages", async () => {
    const context = new Context().add(prop("Draft", ["draft_PLY"], false));
    const pipeline = new Pipeline({ discovery: staticSource([SelectProps, ExtractProps]) });

    const report = await pipeline.run(context);

    expect(context.length).toBe(3);
    expect(ExtractProps.extracted).toEqual(["Crate"]);
    expect(report.stages[2]!.plugins[0]!.outcomes).toHaveLength(1);
  });

  it("runs only the selectors that support the host", async () => {
    const pipeline = new Pipeline({ discovery: staticSource([SelectProps, SelectMayaScene]) });

    const nodeReport = await pipeline.run(new Context());
    expect(nodeReport.stages[0]!.plugins.map((p) => p.plugin)).toEqual(["SelectProps"]);

    const mayaContext = new Context();
    const mayaReport = await pipeline.run(mayaContext, { host: "maya" });
    expect(mayaReport.host).toBe("maya");
    expect(mayaReport.stages[0]!.plugins.map((p) => p.plugin)).toEqual(["SelectProps", "SelectMayaScene"]);
    expect(mayaContext.length).toBe(3);
  });

  it("orders plugins by order, keeping discovery order for ties", async () => {
    const pipeline = new Pipeline({
      discovery: staticSource([SelectProps, ValidateLate, ValidateNaming, ValidateEarly]),
      settings: { stages: ["selectors", "validators"] },
    });

    const report = await pipeline.run(new Context());
    expect(report.stages[1]!.plugins.map((p) => p.plugin)).toEqual(["ValidateNaming", "ValidateEarly", "ValidateLate"]);
  });

  it("skips later stages after a validation failure", async () => {
    const pipeline = new Pipeline({ discovery: staticSource([SelectMisnamed, ValidateNaming, ExtractProps, ConformProps]) });

    const report = await pipeline.run(new Context());

    expect(report.failures).toBe(1);
    expect(report.stages.map((s) => [s.stage, s.status])).toEqual([
      ["selectors", "completed"],
      ["validators", "failed"],
      ["extractors", "skipped"],
      ["conformers", "skipped"],
    ]);
    expect(report.stages[1]!.plugins[0]!.outcomes[0]).toEqual({
      instance_id: expect.any(String),
      instance_name: "Barrel",
      ok: false,
      error: { name: "ValidationError", message: 'Misnamed nodes in "Barrel": hoop' },
    });
    expect(report.stages[2]!.plugins).toEqual([]);
    expect(ExtractProps.extracted).toEqual([]);
  });

  it("keeps going after a validation failure when told to", async () => {
    const pipeline = new Pipeline({
      discovery: staticSource([SelectMisnamed, ValidateNaming, ExtractProps]),
      settings: { stop_on_validation_failure: false },
    });

    const report = await pipeline.run(new Context());

    expect(report.stages.map((s) => s.status)).toEqual(["completed", "failed", "completed", "completed"]);
    expect(ExtractProps.extracted).toEqual(["Barrel"]);
  });

  it("does not skip conformers after an extraction failure", async () => {
    const pipeline = new Pipeline({ discovery: staticSource([SelectProps, ExtractBroken, ConformProps]) });

    const report = await pipeline.run(new Context());

    expect(report.failures).toBe(1);
    expect(report.stages.map((s) => s.status)).toEqual(["completed", "completed", "failed", "completed"]);
    expect(ConformProps.conformed).toEqual(["Crate"]);
  });

  it("aborts on the first failure under the abort policy", async () => {
    const pipeline = new Pipeline({
      discovery: staticSource([SelectMisnamed, ValidateNaming, ExtractProps]),
      settings: { failure_policy: "abort" },
    });

    const error = await pipeline.run(new Context()).then(
      () => null,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(PipelineAbortedError);
    if (error instanceof PipelineAbortedError) {
      expect(error.message).toBe('Publish aborted in validators by ValidateNaming: Misnamed nodes in "Barrel": hoop');
      expect(error.cause).toBeInstanceOf(ValidationError);
    }
    expect(ExtractProps.extracted).toEqual([]);
  });

  it("records a plugin that cannot be constructed and runs its siblings", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});
    const pipeline = new Pipeline({ discovery: staticSource([SelectProps, ExplodingConformer, ConformProps]) });

    const report = await pipeline.run(new Context());

    const conformers = report.stages[3]!;
    expect(conformers.status).toBe("failed");
    expect(conformers.plugins[0]).toEqual({
      plugin: "ExplodingConformer",
      stage: "conformers",
      crashed: true,
      outcomes: [
        { instance_id: null, instance_name: null, ok: false, error: { name: "Error", message: "missing tracker credentials" } },
      ],
    });
    expect(ConformProps.conformed).toEqual(["Crate"]);
    expect(errorLog).toHaveBeenCalledWith("[pipeline] Plugin ExplodingConformer crashed in conformers: missing tracker credentials");
  });

  it("wraps non-error values thrown by a plugin generator", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const pipeline = new Pipeline({ discovery: staticSource([SelectProps, TrackerOffline]) });

    const report = await pipeline.run(new Context());

    expect(report.stages[3]!.plugins[0]!.outcomes[0]!.error).toEqual({
      name: "PluginError",
      message: "Non-error value thrown: tracker offline",
    });
  });

  it("runs custom stages from settings", async () => {
    const pipeline = new Pipeline({
      discovery: staticSource([SelectProps, ValidateNaming, NotifyChat]),
      settings: { stages: ["selectors", "notifiers"] },
    });

    const report = await pipeline.run(new Context());

    expect(report.stages.map((s) => s.stage)).toEqual(["selectors", "notifiers"]);
    expect(report.stages[1]!.plugins[0]!.outcomes.map((o) => o.instance_name)).toEqual(["Crate"]);
  });

  it("exposes the effective settings", () => {
    const pipeline = new Pipeline({ discovery: staticSource([]), settings: { host: "houdini" } });
    expect(pipeline.getSettings()).toEqual({
      host: "houdini",
      stages: ["selectors", "validators", "extractors", "conformers"],
      failure_policy: "continue",
      stop_on_validation_failure: true,
    });
  });
});

describe("Pipeline journaling", () => {
  let testDir: string;
  let journal: Journal;

  beforeEach(async () => {
    testDir = join(tmpdir(), `pubkit-test-${uuid()}`);
    await mkdir(testDir, { recursive: true });
    journal = new Journal(join(testDir, "journal.jsonl"), { fsync: false, lock: false });
    await journal.init();
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await journal.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it("journals the run as a sequence of events", async () => {
    const pipeline = new Pipeline({ discovery: staticSource([SelectProps, ValidateNaming]), journal });

    await pipeline.run(new Context(), { runId: "publish-run" });

    const events = journal.readRun("publish-run");
    expect(events.map((e) => e.type)).toEqual([
      "publish.started",
      "stage.started",
      "instance.processed",
      "instance.processed",
      "stage.completed",
      "stage.started",
      "instance.processed",
      "stage.completed",
      "stage.started",
      "stage.completed",
      "stage.started",
      "stage.completed",
      "publish.completed",
    ]);
    expect(events[0]!.payload).toEqual({
      host: "node",
      stages: ["selectors", "validators", "extractors", "conformers"],
      failure_policy: "continue",
    });
    expect(events[12]!.payload).toEqual({
      failures: 0,
      stages: [
        { stage: "selectors", status: "completed" },
        { stage: "validators", status: "completed" },
        { stage: "extractors", status: "completed" },
        { stage: "conformers", status: "completed" },
      ],
    });
    expect((await journal.verifyIntegrity()).valid).toBe(true);
  });

  it("journals failures, skipped stages and aborts", async () => {
    const pipeline = new Pipeline({ discovery: staticSource([SelectMisnamed, ValidateNaming]), journal });
    await pipeline.run(new Context(), { runId: "skipped-run" });

    const skipped = journal.readRun("skipped-run").filter((e) => e.type === "stage.skipped");
    expect(skipped.map((e) => e.payload)).toEqual([
      { stage: "extractors", reason: "validation_failed" },
      { stage: "conformers", reason: "validation_failed" },
    ]);

    const aborting = new Pipeline({
      discovery: staticSource([SelectMisnamed, ValidateNaming]),
      journal,
      settings: { failure_policy: "abort" },
    });
    await expect(aborting.run(new Context(), { runId: "aborted-run" })).rejects.toThrow(PipelineAbortedError);

    const types = journal.readRun("aborted-run").map((e) => e.type);
    expect(types.slice(-2)).toEqual(["instance.failed", "publish.aborted"]);
  });
});

describe("Pipeline with discovered plugins", () => {
  it("publishes the fixture plugins end to end", async () => {
    const registry = new PluginRegistry();
    await registry.registerPluginPath(FIXTURE_PLUGINS);
    const discovery = new PluginDiscovery(registry, { extensions: [".ts"] });
    const pipeline = new Pipeline({ discovery });
    const context = new Context();

    const report = await pipeline.run(context);

    expect(report.failures).toBe(0);
    expect(report.stages.map((s) => [s.stage, s.plugins.map((p) => p.plugin)])).toEqual([
      ["selectors", ["SelectProps"]],
      ["validators", ["ValidatePropNaming"]],
      ["extractors", ["ExtractPropManifest"]],
      ["conformers", []],
    ]);
    expect(context.find("Crate")?.config.get("manifest")).toBe("crate_PLY,lid_PLY");
    expect(context.find("Scratch")?.config.has("manifest")).toBe(false);
  });
});
