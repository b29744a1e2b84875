// Shared type definitions for pr-fleet

export type * from "./types/provider.js";
export type * from "./types/results.js";
export type * from "./types/config.js";
export {
  isCheckFailed,
  isCheckSuccessful,
  parseRepositoryName,
} from "./types/provider.js";
