/**
 * dita-scaffold — public API
 */

export * from "./templates/index.js";

export { normalize, toKebabCase, prefixFor, topicFileName } from "./naming/normalizer.js";
export { AuthoringSession, DEFAULT_MAX_ITEMS_PER_TYPE } from "./session/session.js";
export type { RestoredTopic, SessionOptions } from "./session/session.js";
export { SessionStore } from "./session/store.js";
export { buildChapterMap, DEFAULT_MAP_DOCTYPE } from "./map/chapter_map.js";
export type { MapDoctype } from "./map/chapter_map.js";
export { buildDitaExportFiles, createDitaExportZip } from "./exports/dita_export.js";
export type { DitaExportInput, DitaExportResult } from "./exports/dita_export.js";
export { readBundle, inspectTopic } from "./exports/bundle_reader.js";
export type { BundleContents, BundleMap, BundleTopic, TopicInfo } from "./exports/bundle_reader.js";
export { createApp, startServer } from "./api/server.js";
export * from "./shared/errors.js";
export * from "./shared/types.js";
