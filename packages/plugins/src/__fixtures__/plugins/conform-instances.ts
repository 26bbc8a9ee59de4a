import { ValidationError } from "@pubkit/schemas";
import { Conformer, type InstanceView } from "../../index.js";

/** Reports published instances to the asset tracker, keyed by `asset_id`. */
export class ConformInstances extends Conformer {
  static families = ["test.family"];

  conform(instance: InstanceView): void {
    const assetId = instance.config.get("asset_id");
    if (typeof assetId !== "string") {
      throw new ValidationError(`"${instance.name}" has no asset_id to report against`);
    }
    this.log.info(`published ${instance.name}`, { asset_id: assetId, nodes: instance.length });
  }
}
