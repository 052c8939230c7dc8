// File system utilities
export * from "./fs";

// Archive naming and timestamps
export * from "./time";

// Export formats for native documents
export * from "./mime-types";
