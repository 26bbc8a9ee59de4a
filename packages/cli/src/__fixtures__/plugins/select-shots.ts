import { Selector, type Context, type Instance } from "@pubkit/plugins";

function shot(context: Context, name: string, start: number, end: number): Instance {
  const instance = context.createInstance(name);
  instance.add(`${name.toLowerCase()}_CAM`);
  instance.config.family = "shot";
  instance.config.host = "node";
  instance.config.set(context.identifierKey, true);
  instance.config.set("frame_start", start).set("frame_end", end);
  return instance;
}

export class SelectShots extends Selector {
  static hosts = ["node"];

  *select(context: Context): Generator<Instance> {
    yield shot(context, "Shot010", 1001, 1100);
    yield shot(context, "Shot020", 1100, 1001);
  }
}
