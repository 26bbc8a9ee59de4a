export {
  Pipeline,
  type PipelineConfig,
  type PipelineSettings,
  type PluginSource,
  type RunOptions,
} from "./pipeline.js";
