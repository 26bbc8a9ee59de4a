import { Selector, Instance, type Context } from "@pubkit/plugins";

function prop(name: string, nodes: string[], publishable: boolean): Instance {
  const instance = new Instance(name);
  for (const node of nodes) instance.add(node);
  instance.config.family = "prop";
  instance.config.host = "node";
  instance.config.identifier = publishable;
  return instance;
}

export class SelectProps extends Selector {
  static hosts = ["node"];

  *select(_context: Context): Generator<Instance> {
    yield prop("Crate", ["crate_PLY", "lid_PLY"], true);
    yield prop("Scratch", ["scratch_PLY"], false);
  }
}
