export * from "./FetcherRegistry";
export * from "./FileFetcher";
export * from "./HttpFetcher";
export type * from "./types";
