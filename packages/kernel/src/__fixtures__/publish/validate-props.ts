import { ValidationError } from "@pubkit/schemas";
import { Validator, type InstanceView } from "@pubkit/plugins";

export class ValidatePropNaming extends Validator {
  static families = ["prop"];

  validate(instance: InstanceView): void {
    const misnamed = instance.nodes.filter((node) => !node.endsWith("_PLY"));
    if (misnamed.length > 0) {
      throw new ValidationError(`Misnamed nodes in "${instance.name}": ${misnamed.join(", ")}`);
    }
  }
}
