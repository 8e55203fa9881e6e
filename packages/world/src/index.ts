export { WorldGraph, collectIntegrityIssues } from "./world-graph.js";
export type { Scene, Choice } from "./world-graph.js";
export { loadWorldFile, loadDefaultWorld, parseWorldDefinition, DEFAULT_WORLD_PATH } from "./world-loader.js";
