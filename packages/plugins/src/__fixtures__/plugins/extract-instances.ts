import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ValidationError } from "@pubkit/schemas";
import { Extractor, type Instance } from "../../index.js";

/** Writes the node list of each instance to `<staging_dir>/<name>.json`. */
export class ExtractInstances extends Extractor {
  static families = ["test.*"];
  static order = 1;

  extract(instance: Instance): void {
    const nodes = [...instance.nodes];
    const stagingDir = instance.config.get("staging_dir");
    if (typeof stagingDir === "string") {
      mkdirSync(stagingDir, { recursive: true });
      writeFileSync(join(stagingDir, `${instance.name}.json`), JSON.stringify({ name: instance.name, nodes }));
    }
    instance.config.set("extracted_nodes", nodes);
  }
}

export class ExtractInstancesFail extends Extractor {
  static families = ["test.family"];

  extract(instance: Instance): void {
    throw new ValidationError(`Extraction of "${instance.name}" failed`);
  }
}
