export * from "./3d/bwmerror";
export * from "./3d/bwmmodel";
export * from "./3d/bwmstride";
export * from "./3d/bwmfile";
export * from "./3d/bwmutils";
export { bwmModelSummary, bwmModelToJson } from "./scripts/bwmjson";
export { Stream } from "./utils";
