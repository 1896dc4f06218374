export * from "./logger";
export * from "./db";
export * from "./catalog";
export * from "./matching";
export * from "./pricing";
export * from "./clients/http";
export * from "./clients/albionData";
