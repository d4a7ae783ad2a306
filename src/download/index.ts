export { DocumentAcquirer, filenameFromUrl, generateFilenameVariants } from "./downloader";
export type { DocumentAcquirerDeps, SourceCandidate } from "./downloader";
export { loadUrlOverrides, lookupOverride, parseUrlOverrides } from "./urlOverrides";
export type { UrlOverrideTable } from "./urlOverrides";
