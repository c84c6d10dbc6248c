// Domain types
export * from "./types/agent.js";
export * from "./types/conversation.js";
export * from "./types/context.js";
export * from "./types/spec.js";

// Constants
export * from "./constants/index.js";

// Output filenames
export * from "./filename.js";

// <feature>.spec.md serialization
export * from "./spec-serializer.js";
