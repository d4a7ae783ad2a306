export * from "./calendar";
export { extractReferenceDate, matchReferenceDate } from "./dateExtractor";
export type { DateMatch } from "./dateExtractor";
