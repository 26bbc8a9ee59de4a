import { ValidationError } from "@pubkit/schemas";
import { Validator, type InstanceView } from "@pubkit/plugins";

export class ValidateFrameRange extends Validator {
  static families = ["shot"];
  static label = "Frame range";

  validate(instance: InstanceView): void {
    const start = instance.config.get("frame_start");
    const end = instance.config.get("frame_end");
    if (typeof start !== "number" || typeof end !== "number") {
      throw new ValidationError(`"${instance.name}" has no frame range`);
    }
    if (start > end) {
      throw new ValidationError(`Frame range of "${instance.name}" is reversed: ${start}-${end}`);
    }
  }
}
