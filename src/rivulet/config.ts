interface RivuletConfig {
  onUnhandledError: (error: unknown) => void;
  log: (message: string) => void;
  defaultTimeoutDelay: number;
}
function rethrowOnTimer(error: unknown): void {
  setTimeout(() => {
    throw error;
  }, 0);
}
function createDefaultConfig(): RivuletConfig {
  return {
    onUnhandledError: rethrowOnTimer,
    log: (message) => {
      console.log(message);
    },
    defaultTimeoutDelay: 0,
  };
}
const config: RivuletConfig = createDefaultConfig();
function configure(overrides: Partial<RivuletConfig>): RivuletConfig {
  Object.assign(config, overrides);
  return config;
}
function resetConfig(): void {
  Object.assign(config, createDefaultConfig());
}
function reportUnhandledError(error: unknown): void {
  config.onUnhandledError(error);
}
export { type RivuletConfig, config, configure, resetConfig, reportUnhandledError };
