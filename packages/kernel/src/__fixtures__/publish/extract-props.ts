import { Extractor, type Instance } from "@pubkit/plugins";

/** Records the node manifest on the instance instead of writing files. */
export class ExtractPropManifest extends Extractor {
  static families = ["prop"];

  extract(instance: Instance): void {
    instance.config.set("manifest", instance.nodes.join(","));
  }
}
