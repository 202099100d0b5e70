export { ImageCollector } from "./ImageCollector";
export type * from "./types";
