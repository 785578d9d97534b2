export * from "./segmentation";
export { createLogger, segmentationLog, type Logger } from "./lib/logger";
