export * from "./logger";
export * from "./db";
export * from "./catalog";
export * from "./matching";
export * from "./pricing";
export * from "./clients/http";
// Albion Data types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/albionData" within src/clients/albionData/ only.
