export type ToolgateConfig = {
  execution: {
    parallel: boolean;
    maxConcurrent: number;
    safetyMode: SafetyMode;
    /** Per-call execution bound; 0 disables it. */
    toolTimeoutMs: number;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
  };
  approval: {
    tools: string[];
    allTools: boolean;
  };
  events: {
    capacity: number;
    overflow: OverflowPolicy;
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
};

export type SafetyMode = "optimistic" | "pessimistic";

export type OverflowPolicy = "drop-oldest" | "drop-newest";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFormat = "json" | "pretty";

export type ConfigSource = "global" | "project" | "env" | "default";
