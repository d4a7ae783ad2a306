export { Accumulator, mergeSupersedeByDate, sortAndFilterByDate } from "./accumulator";
export type { SaveOptions, SaveResult } from "./accumulator";
