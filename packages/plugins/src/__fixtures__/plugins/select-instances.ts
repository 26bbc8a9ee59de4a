import { Selector, Instance, type Context } from "../../index.js";

export class SelectInstances extends Selector {
  static hosts = ["standalone"];

  *select(_context: Context): Generator<Instance> {
    const instance = new Instance("SelectedInstance");
    instance.add("selected_body_PLY");
    instance.add("selected_lid_PLY");
    instance.add("selected_root_GRP");
    instance.config.family = "test.family";
    instance.config.host = "standalone";
    instance.config.identifier = true;
    yield instance;
  }
}

/** Only applies inside Maya. */
export class SelectMayaScene extends Selector {
  static hosts = ["maya"];

  *select(_context: Context): Generator<Instance> {
    const instance = new Instance("MayaScene");
    instance.config.family = "scene";
    instance.config.host = "maya";
    yield instance;
  }
}
