import { ValidationError } from "@pubkit/schemas";
import { Validator, type InstanceView } from "../../index.js";
import { hasValidSuffix } from "./_naming.js";

export class ValidateInstance extends Validator {
  static hosts = ["standalone"];
  static families = ["test.family"];
  static label = "Node naming";

  validate(instance: InstanceView): void {
    const misnamed = instance.nodes.filter((node) => !hasValidSuffix(node));
    if (misnamed.length > 0) {
      throw new ValidationError(`Misnamed nodes in "${instance.name}": ${misnamed.join(", ")}`);
    }
  }
}

export class ValidateOtherFamily extends Validator {
  static hosts = ["*"];
  static families = ["test.other_family"];

  validate(instance: InstanceView): void {
    if (instance.length === 0) {
      throw new ValidationError(`"${instance.name}" has no nodes`);
    }
  }
}
