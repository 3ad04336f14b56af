/**
 * Prefix logger that only prints in debug mode.
 * Debug mode is switched on by `ROLLSTATS_DEBUG` in the environment, or per instance with `forceEnable`.
 */
export class Logger {
  private readonly enabled: boolean;
  private readonly prefix: string;

  constructor(prefix: string, forceEnable = false) {
    this.prefix = prefix;
    this.enabled = forceEnable || isDebugMode();
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  log(...args: unknown[]): void {
    if (this.enabled) {
      console.log(`[${this.prefix}]`, ...args);
    }
  }
}

function isDebugMode(): boolean {
  const flag = typeof process !== "undefined" ? process.env.ROLLSTATS_DEBUG : undefined;
  return flag !== undefined && flag !== "" && flag !== "0" && flag !== "false";
}

export function createLogger(prefix: string, forceEnable = false): Logger {
  return new Logger(prefix, forceEnable);
}
