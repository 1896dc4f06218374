/**
 * Utils barrel exports
 */

export * from "./text/sequenceSimilarity";
export * from "./catalogValidation";
