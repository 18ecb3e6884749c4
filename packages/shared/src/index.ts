export * from "./types/calls.js";
export * from "./types/events.js";
export * from "./types/values.js";
export * from "./utils/env.js";
export * from "./utils/id.js";
export * from "./utils/time.js";
