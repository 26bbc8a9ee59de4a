import type { PluginLogger } from "@pubkit/schemas";

type Level = keyof PluginLogger;

const SINKS: Record<Level, (...args: unknown[]) => void> = {
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
  debug: (...args) => console.debug(...args),
};

export interface PluginLoggerOptions {
  /** Print debug lines. Default: PUBKIT_DEBUG=1 */
  verbose?: boolean;
}

/** Console logger scoped to one plugin, e.g. `[plugin:ValidateInstance] ...`. */
export class PluginLoggerImpl implements PluginLogger {
  private readonly prefix: string;
  private readonly verbose: boolean;

  constructor(pluginName: string, options?: PluginLoggerOptions) {
    // Plugin names come from loaded modules; keep them on one log line
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeName = pluginName.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.prefix = `[plugin:${safeName}]`;
    this.verbose = options?.verbose ?? process.env.PUBKIT_DEBUG === "1";
  }

  getPrefix(): string {
    return this.prefix;
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) this.write("debug", message, data);
  }

  private write(level: Level, message: string, data: Record<string, unknown> | undefined): void {
    const line = `${this.prefix} ${message}`;
    if (data === undefined) SINKS[level](line);
    else SINKS[level](line, data);
  }
}
