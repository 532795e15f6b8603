/**
 * Pipeline modules export
 */

export { load, mergeCatalogues } from "./loader";
export { plan } from "./planner";
export { translate } from "./translator";
export { download } from "./downloader";
export { stats, pending, formatDuration } from "./stats";
