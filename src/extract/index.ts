import { Row } from "../datasets";
import { accommodationExtractor } from "./accommodation";
import { landingsExtractor } from "./landings";
import { nationalityExtractor } from "./nationality";
import { DatasetExtractor } from "./types";

/** Every dataset extractor, in the order reports are summarized. */
export const DATASET_EXTRACTORS: ReadonlyArray<DatasetExtractor<Row>> = [
  nationalityExtractor,
  accommodationExtractor,
  landingsExtractor,
];

export { accommodationExtractor, accommodationTableStrategy, accommodationTextStrategy, MIN_REGIONS } from "./accommodation";
export {
  containsAll,
  containsAny,
  extractOne,
  listDocuments,
  locatePageByMatchers,
  matchesPattern,
  processAll,
} from "./engine";
export type { DatasetExtractionSummary, PageMatcher, ProcessAllDeps } from "./engine";
export { chartLabelStrategy, isolateChartArea, landingsExtractor, relaxedChartStrategy } from "./landings";
export { nationalityExtractor, nationalityTableStrategy, nationalityTextStrategy, normalizeNationality } from "./nationality";
export { PdfDocumentLoader } from "./pdfDocument";
export type { DocumentSource, PdfDocumentLoaderDeps } from "./pdfDocument";
export { ITALIAN_REGIONS, matchRegion, normalizeRegionKey } from "./regions";
export type { ItalianRegion } from "./regions";
export * from "./textUtils";
export * from "./types";
