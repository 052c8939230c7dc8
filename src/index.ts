// Backup pipeline and its building blocks
export * from "./core";

// Utilities
export * from "./utils";

// Configuration
export * from "./config";

// Types
export * from "./types";
